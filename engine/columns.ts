import { COLUMNS, type ColumnRange } from "./types";

export function columnRange(col: number): ColumnRange {
  if (!Number.isInteger(col) || col < 0 || col >= COLUMNS) {
    throw new RangeError(`Column ${col} is outside 0..${COLUMNS - 1}`);
  }
  if (col === 0) {
    return { min: 1, max: 9 };
  }
  if (col === COLUMNS - 1) {
    return { min: 80, max: 90 };
  }
  return { min: col * 10, max: col * 10 + 9 };
}

export const COLUMN_RANGES: readonly ColumnRange[] = Array.from(
  { length: COLUMNS },
  (_, col) => columnRange(col)
);

export function columnValues(col: number): number[] {
  const { min, max } = columnRange(col);
  const values: number[] = [];
  for (let value = min; value <= max; value += 1) {
    values.push(value);
  }
  return values;
}
