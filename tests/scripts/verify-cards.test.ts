import test from "node:test";
import assert from "node:assert/strict";
import { createCard } from "../../engine/cards";
import { verifyCards } from "../../scripts/verify_cards";
import { rowsCopy, variantCard } from "../engine/helpers";

test("verifyCards reports invalid cards and repeats", () => {
  const rows = rowsCopy();
  rows[1][7] = null;
  const short = createCard(rows);
  const a = variantCard(0);
  const b = variantCard(1);

  assert.deepEqual(verifyCards([a, short, b, a]), {
    total: 4,
    invalid: [
      {
        index: 1,
        issues: ["Row 1 has 4 numbers, expected 5", "Card has 14 numbers, expected 15"],
      },
    ],
    duplicates: [[0, 3]],
  });
});

test("verifyCards passes a clean batch", () => {
  assert.deepEqual(verifyCards([variantCard(0), variantCard(3)]), {
    total: 2,
    invalid: [],
    duplicates: [],
  });
});
