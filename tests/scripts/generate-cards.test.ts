import test from "node:test";
import assert from "node:assert/strict";
import { emptyStats } from "../../engine/types";
import { describeProgress } from "../../scripts/generate_cards";

test("describeProgress formats batch events", () => {
  assert.equal(
    describeProgress({ type: "batch_start", batch: 2, size: 500, remaining: 700 }),
    "[cards] batch 2 · 500 cards · 700 remaining"
  );
  assert.equal(
    describeProgress({ type: "batch_complete", batch: 2, accepted: 800, total: 1200 }),
    "[cards] batch 2 done · 800/1200"
  );
});

test("describeProgress only reports repeated duplicates", () => {
  assert.equal(describeProgress({ type: "duplicate", batch: 1, consecutive: 1 }), null);
  assert.equal(
    describeProgress({ type: "duplicate", batch: 1, consecutive: 4 }),
    "[cards] batch 1 · 4 duplicates in a row"
  );
});

test("describeProgress summarises a finished run", () => {
  const stats = { ...emptyStats(), attempts: 12, accepted: 10, rejectedDuplicate: 2, rejectedInvalid: 1 };
  assert.equal(
    describeProgress({ type: "complete", total: 10, stats }),
    "[cards] 10 unique cards · 12 drawn · 2 duplicates · 1 invalid"
  );
});
