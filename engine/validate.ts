import { columnRange } from "./columns";
import {
  COLUMNS,
  MAX_PER_COLUMN,
  MIN_PER_COLUMN,
  NUMBERS_PER_CARD,
  NUMBERS_PER_ROW,
  ROWS,
  type Card,
} from "./types";

export function validateCard(card: Card): string[] {
  const issues: string[] = [];
  if (card.length !== ROWS) {
    return [`Card has ${card.length} rows, expected ${ROWS}`];
  }
  const badRow = card.findIndex((row) => row.length !== COLUMNS);
  if (badRow !== -1) {
    return [`Row ${badRow} has ${card[badRow].length} cells, expected ${COLUMNS}`];
  }

  let filled = 0;
  card.forEach((row, rowIndex) => {
    const count = row.filter((cell) => cell !== null).length;
    filled += count;
    if (count !== NUMBERS_PER_ROW) {
      issues.push(`Row ${rowIndex} has ${count} numbers, expected ${NUMBERS_PER_ROW}`);
    }
  });
  if (filled !== NUMBERS_PER_CARD) {
    issues.push(`Card has ${filled} numbers, expected ${NUMBERS_PER_CARD}`);
  }

  const seen = new Set<number>();
  for (let col = 0; col < COLUMNS; col += 1) {
    const { min, max } = columnRange(col);
    const values: number[] = [];
    for (let row = 0; row < ROWS; row += 1) {
      const cell = card[row][col];
      if (cell === null) {
        continue;
      }
      if (!Number.isInteger(cell)) {
        issues.push(`Cell [${row}][${col}] is not an integer`);
        continue;
      }
      if (cell < min || cell > max) {
        issues.push(`Column ${col} value ${cell} is outside [${min}, ${max}]`);
      }
      if (seen.has(cell)) {
        issues.push(`Value ${cell} appears more than once`);
      }
      seen.add(cell);
      values.push(cell);
    }
    if (values.length < MIN_PER_COLUMN || values.length > MAX_PER_COLUMN) {
      issues.push(
        `Column ${col} has ${values.length} numbers, expected ${MIN_PER_COLUMN}-${MAX_PER_COLUMN}`
      );
    }
    for (let i = 1; i < values.length; i += 1) {
      if (values[i] <= values[i - 1]) {
        issues.push(`Column ${col} is not strictly ascending`);
        break;
      }
    }
  }

  return issues;
}

export function isValidCard(card: Card): boolean {
  return validateCard(card).length === 0;
}
