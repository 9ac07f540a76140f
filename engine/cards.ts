import fs from "fs";
import { COLUMNS, ROWS, type Card, type CardRow, type Cell } from "./types";

export class CardFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CardFormatError";
  }
}

export interface CardFile {
  round?: string;
  cards: Card[];
}

export function createCard(rows: readonly (readonly Cell[])[]): Card {
  if (rows.length !== ROWS) {
    throw new CardFormatError(`Card must have ${ROWS} rows, got ${rows.length}`);
  }
  const frozen: CardRow[] = rows.map((row, index) => {
    if (row.length !== COLUMNS) {
      throw new CardFormatError(
        `Row ${index} must have ${COLUMNS} cells, got ${row.length}`
      );
    }
    return Object.freeze([...row]);
  });
  return Object.freeze(frozen);
}

function parseCell(raw: unknown, row: number, col: number): Cell {
  // 0 is accepted as an empty cell, matching the fingerprint sentinel.
  if (raw === null || raw === 0) {
    return null;
  }
  if (typeof raw !== "number" || !Number.isInteger(raw)) {
    throw new CardFormatError(`Cell [${row}][${col}] is not an integer or null`);
  }
  return raw;
}

export function parseCard(value: unknown): Card {
  if (!Array.isArray(value)) {
    throw new CardFormatError("Card must be an array of rows");
  }
  const rows: Cell[][] = [];
  value.forEach((rawRow: unknown, rowIndex) => {
    if (!Array.isArray(rawRow)) {
      throw new CardFormatError(`Row ${rowIndex} is not an array`);
    }
    rows.push(rawRow.map((raw: unknown, col) => parseCell(raw, rowIndex, col)));
  });
  return createCard(rows);
}

export function parseCardFile(data: unknown): CardFile {
  if (Array.isArray(data)) {
    return { cards: data.map((entry: unknown) => parseCard(entry)) };
  }
  if (typeof data !== "object" || data === null || !("cards" in data)) {
    throw new CardFormatError("Expected an array of cards or an object with `cards`");
  }
  const { cards } = data;
  if (!Array.isArray(cards)) {
    throw new CardFormatError("`cards` must be an array");
  }
  const round =
    "round" in data && (typeof data.round === "string" || typeof data.round === "number")
      ? String(data.round)
      : undefined;
  return { round, cards: cards.map((entry: unknown) => parseCard(entry)) };
}

export function loadCardFile(filePath: string): CardFile {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseCardFile(JSON.parse(raw));
}

export function columnCounts(card: Card): number[] {
  const counts = new Array<number>(COLUMNS).fill(0);
  card.forEach((row) => {
    row.forEach((cell, col) => {
      if (cell !== null) {
        counts[col] += 1;
      }
    });
  });
  return counts;
}

export function rowCounts(card: Card): number[] {
  return card.map((row) => row.filter((cell) => cell !== null).length);
}

export function cardNumbers(card: Card): number[] {
  const numbers: number[] = [];
  card.forEach((row) => {
    row.forEach((cell) => {
      if (cell !== null) {
        numbers.push(cell);
      }
    });
  });
  return numbers.sort((a, b) => a - b);
}
