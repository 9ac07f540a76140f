import {
  COLUMNS,
  MAX_PER_COLUMN,
  MIN_PER_COLUMN,
  NUMBERS_PER_CARD,
  NUMBERS_PER_ROW,
  ROWS,
} from "../engine/types";
import type { Rng } from "./rng";

export interface CardLayout {
  counts: number[];
  rows: number[][];
}

export class InvalidDistributionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDistributionError";
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function combinations(items: readonly number[], size: number): number[][] {
  if (size === 0) {
    return [[]];
  }
  const result: number[][] = [];
  items.forEach((item, index) => {
    combinations(items.slice(index + 1), size - 1).forEach((rest) => {
      result.push([item, ...rest]);
    });
  });
  return result;
}

/**
 * Gale-Ryser test: can a 0/1 matrix have these row sums (`capacities`) and
 * column sums (`counts`)?
 */
export function isFeasible(
  capacities: readonly number[],
  counts: readonly number[]
): boolean {
  if (sum(capacities) !== sum(counts)) {
    return false;
  }
  if (counts.some((count) => count < 0 || count > capacities.length)) {
    return false;
  }
  const sorted = [...capacities].sort((a, b) => b - a);
  let top = 0;
  for (let k = 1; k <= sorted.length; k += 1) {
    top += sorted[k - 1];
    const reachable = counts.reduce((total, count) => total + Math.min(count, k), 0);
    if (top > reachable) {
      return false;
    }
  }
  return true;
}

export function distributeColumns(rng: Rng): number[] {
  const counts = new Array<number>(COLUMNS).fill(MIN_PER_COLUMN);
  for (let remaining = NUMBERS_PER_CARD - sum(counts); remaining > 0; remaining -= 1) {
    const eligible: number[] = [];
    counts.forEach((count, col) => {
      if (count < MAX_PER_COLUMN) {
        eligible.push(col);
      }
    });
    if (eligible.length === 0) {
      throw new InvalidDistributionError(
        `No column can take another number with ${remaining} left to place`
      );
    }
    counts[rng.pick(eligible)] += 1;
  }
  return counts;
}

export function assignRows(counts: readonly number[], rng: Rng): number[][] {
  if (counts.length !== COLUMNS) {
    throw new InvalidDistributionError(
      `Expected ${COLUMNS} column counts, got ${counts.length}`
    );
  }
  const capacities = new Array<number>(ROWS).fill(NUMBERS_PER_ROW);
  const pending = [...counts];
  if (!isFeasible(capacities, pending)) {
    throw new InvalidDistributionError(
      `Column counts [${counts.join(", ")}] cannot fill ${ROWS} rows of ${NUMBERS_PER_ROW}`
    );
  }

  const rows: number[][] = counts.map(() => []);
  const order = rng.shuffle(counts.map((_, col) => col));
  for (const col of order) {
    pending[col] = 0;
    const open: number[] = [];
    capacities.forEach((capacity, row) => {
      if (capacity > 0) {
        open.push(row);
      }
    });
    const choices = combinations(open, counts[col]).filter((chosen) => {
      const next = [...capacities];
      chosen.forEach((row) => {
        next[row] -= 1;
      });
      return isFeasible(next, pending);
    });
    if (choices.length === 0) {
      throw new InvalidDistributionError(`No feasible rows left for column ${col}`);
    }
    const chosen = rng.pick(choices);
    chosen.forEach((row) => {
      capacities[row] -= 1;
    });
    rows[col] = chosen;
  }
  return rows;
}

export interface LayoutResult {
  layout: CardLayout | null;
  retries: number;
}

export function buildLayout(rng: Rng, maxAttempts: number): LayoutResult {
  let retries = 0;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const counts = distributeColumns(rng);
      return { layout: { counts, rows: assignRows(counts, rng) }, retries };
    } catch (error) {
      if (!(error instanceof InvalidDistributionError)) {
        throw error;
      }
      retries += 1;
    }
  }
  return { layout: null, retries };
}
