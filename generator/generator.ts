import { createCard } from "../engine/cards";
import { columnValues } from "../engine/columns";
import { validateCard } from "../engine/validate";
import {
  COLUMNS,
  ROWS,
  emptyStats,
  type Card,
  type CardSource,
  type Cell,
  type GenerationStats,
} from "../engine/types";
import { buildLayout, type CardLayout } from "./layout";
import { Rng, createSeed } from "./rng";

export const DEFAULT_MAX_ATTEMPTS = 1000;
export const DEFAULT_MAX_LAYOUT_ATTEMPTS = 100;

export interface CardGeneratorOptions {
  seed?: number;
  rng?: Rng;
  maxAttempts?: number;
  maxLayoutAttempts?: number;
  accept?: (card: Card) => boolean;
}

export interface CardGenerationFailureContext {
  maxAttempts: number;
  lastIssues: string[];
  stats: GenerationStats;
}

export class CardGenerationError extends Error {
  readonly context: CardGenerationFailureContext;

  constructor(message: string, context: CardGenerationFailureContext) {
    super(message);
    this.name = "CardGenerationError";
    this.context = context;
  }
}

const COLUMN_VALUES: readonly (readonly number[])[] = Array.from(
  { length: COLUMNS },
  (_, col) => columnValues(col)
);

function readBudget(raw: number | undefined, fallback: number, label: string): number {
  const value = raw ?? fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer`);
  }
  return value;
}

export function fillLayout(layout: CardLayout, rng: Rng): Card {
  const grid: Cell[][] = Array.from({ length: ROWS }, () =>
    new Array<Cell>(COLUMNS).fill(null)
  );
  layout.rows.forEach((rows, col) => {
    const values = rng
      .sample(COLUMN_VALUES[col], layout.counts[col])
      .sort((a, b) => a - b);
    const marked = [...rows].sort((a, b) => a - b);
    marked.forEach((row, index) => {
      grid[row][col] = values[index];
    });
  });
  return createCard(grid);
}

export class CardGenerator implements CardSource {
  readonly seed: number | undefined;
  private readonly rng: Rng;
  private readonly maxAttempts: number;
  private readonly maxLayoutAttempts: number;
  private readonly accept: ((card: Card) => boolean) | undefined;
  private readonly counters: GenerationStats = emptyStats();

  constructor(options?: CardGeneratorOptions) {
    if (options?.rng) {
      this.seed = options.seed;
      this.rng = options.rng;
    } else {
      this.seed = options?.seed ?? createSeed();
      this.rng = new Rng(this.seed);
    }
    this.maxAttempts = readBudget(
      options?.maxAttempts,
      DEFAULT_MAX_ATTEMPTS,
      "maxAttempts"
    );
    this.maxLayoutAttempts = readBudget(
      options?.maxLayoutAttempts,
      DEFAULT_MAX_LAYOUT_ATTEMPTS,
      "maxLayoutAttempts"
    );
    this.accept = options?.accept;
  }

  generateOne(): Card {
    let lastIssues: string[] = [];
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      this.counters.attempts += 1;
      const { layout, retries } = buildLayout(this.rng, this.maxLayoutAttempts);
      this.counters.layoutRetries += retries;
      if (!layout) {
        lastIssues = [
          `No feasible layout after ${this.maxLayoutAttempts} distributions`,
        ];
        this.counters.rejectedInvalid += 1;
        continue;
      }
      const card = fillLayout(layout, this.rng);
      const issues = validateCard(card);
      if (issues.length === 0 && this.accept && !this.accept(card)) {
        issues.push("Rejected by accept hook");
      }
      if (issues.length > 0) {
        lastIssues = issues;
        this.counters.rejectedInvalid += 1;
        continue;
      }
      this.counters.accepted += 1;
      return card;
    }
    throw new CardGenerationError(
      `Failed to generate a valid card after ${this.maxAttempts} attempts. Last issue: ${
        lastIssues[0] ?? "(none)"
      }`,
      { maxAttempts: this.maxAttempts, lastIssues, stats: this.stats() }
    );
  }

  stats(): GenerationStats {
    return { ...this.counters };
  }
}
