import test from "node:test";
import assert from "node:assert/strict";
import { createCard } from "../../engine/cards";
import { columnRange, columnValues, COLUMN_RANGES } from "../../engine/columns";
import { isValidCard, validateCard } from "../../engine/validate";
import type { Card } from "../../engine/types";
import { rowsCopy, validCard } from "./helpers";

test("column ranges follow the 90-ball layout", () => {
  assert.deepEqual(columnRange(0), { min: 1, max: 9 });
  assert.deepEqual(columnRange(4), { min: 40, max: 49 });
  assert.deepEqual(columnRange(8), { min: 80, max: 90 });
  assert.equal(COLUMN_RANGES.length, 9);
  assert.equal(columnValues(8).length, 11);
  assert.equal(columnValues(0).length, 9);
  assert.throws(() => columnRange(9), RangeError);
});

test("a card with row sums 5,5,5 and 15 numbers is valid", () => {
  assert.deepEqual(validateCard(validCard()), []);
  assert.ok(isValidCard(validCard()));
});

test("a card with a row of 4 numbers is rejected", () => {
  const rows = rowsCopy();
  rows[1][7] = null;
  assert.deepEqual(validateCard(createCard(rows)), [
    "Row 1 has 4 numbers, expected 5",
    "Card has 14 numbers, expected 15",
  ]);
});

test("values outside the column range are rejected", () => {
  const rows = rowsCopy();
  rows[2][4] = 39;
  assert.deepEqual(validateCard(createCard(rows)), [
    "Column 4 value 39 is outside [40, 49]",
  ]);
});

test("columns must ascend top to bottom", () => {
  const rows = rowsCopy();
  rows[0][1] = 15;
  rows[1][1] = 10;
  assert.deepEqual(validateCard(createCard(rows)), [
    "Column 1 is not strictly ascending",
  ]);
});

test("repeated values are reported", () => {
  const rows = rowsCopy();
  rows[0][1] = 15;
  assert.deepEqual(validateCard(createCard(rows)), [
    "Value 15 appears more than once",
    "Column 1 is not strictly ascending",
  ]);
});

test("empty columns are rejected", () => {
  const card = createCard([
    [1, 10, 20, 30, null, null, null, null, 80],
    [5, 15, null, null, null, 50, 60, 70, null],
    [null, null, 25, 35, null, 55, null, 75, 90],
  ]);
  assert.deepEqual(validateCard(card), ["Column 4 has 0 numbers, expected 1-3"]);
});

test("malformed shapes stop validation early", () => {
  const twoRows: Card = [
    [1, 10, 20, 30, null, null, null, null, 80],
    [5, 15, null, null, null, 50, 60, 70, null],
  ];
  assert.deepEqual(validateCard(twoRows), ["Card has 2 rows, expected 3"]);
});
