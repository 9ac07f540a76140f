export const ROWS = 3;
export const COLUMNS = 9;
export const NUMBERS_PER_ROW = 5;
export const NUMBERS_PER_CARD = ROWS * NUMBERS_PER_ROW;
export const MIN_PER_COLUMN = 1;
export const MAX_PER_COLUMN = 3;

export type Cell = number | null;
export type CardRow = readonly Cell[];

export type Card = readonly CardRow[];

export interface ColumnRange {
  min: number;
  max: number;
}

export interface GenerationStats {
  attempts: number;
  accepted: number;
  rejectedDuplicate: number;
  rejectedInvalid: number;
  layoutRetries: number;
}

export interface CardSource {
  generateOne: () => Card;
  stats: () => GenerationStats;
}

export function emptyStats(): GenerationStats {
  return {
    attempts: 0,
    accepted: 0,
    rejectedDuplicate: 0,
    rejectedInvalid: 0,
    layoutRetries: 0,
  };
}
