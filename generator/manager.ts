import { fingerprintCard } from "../engine/fingerprint";
import {
  emptyStats,
  type Card,
  type CardSource,
  type GenerationStats,
} from "../engine/types";
import { CardGenerator, type CardGeneratorOptions } from "./generator";
import { deriveSeed } from "./rng";

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_MAX_CONSECUTIVE_DUPLICATES = 10000;

export class FingerprintRegistry {
  private readonly seen = new Set<string>();

  insertIfAbsent(fingerprint: string): boolean {
    if (this.seen.has(fingerprint)) {
      return false;
    }
    this.seen.add(fingerprint);
    return true;
  }

  has(fingerprint: string): boolean {
    return this.seen.has(fingerprint);
  }

  get size(): number {
    return this.seen.size;
  }
}

export interface ExhaustedSpaceContext {
  requested: number;
  accepted: number;
  consecutiveDuplicates: number;
  stats: GenerationStats;
}

export class ExhaustedSpaceError extends Error {
  readonly context: ExhaustedSpaceContext;

  constructor(message: string, context: ExhaustedSpaceContext) {
    super(message);
    this.name = "ExhaustedSpaceError";
    this.context = context;
  }
}

export class CardIndexError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Card index ${index} out of range (have ${length} cards)`);
    this.name = "CardIndexError";
    this.index = index;
    this.length = length;
  }
}

export type PrepareProgressEvent =
  | {
      type: "batch_start";
      batch: number;
      size: number;
      remaining: number;
    }
  | {
      type: "duplicate";
      batch: number;
      consecutive: number;
    }
  | {
      type: "batch_complete";
      batch: number;
      accepted: number;
      total: number;
    }
  | {
      type: "complete";
      total: number;
      stats: GenerationStats;
    };

export interface CardManagerOptions {
  seed?: number;
  workers?: number;
  generator?: Omit<CardGeneratorOptions, "seed" | "rng">;
  sources?: CardSource[];
  maxConsecutiveDuplicates?: number;
  onProgress?: (event: PrepareProgressEvent) => void;
}

function buildSources(options?: CardManagerOptions): CardSource[] {
  if (options?.sources) {
    if (options.sources.length === 0) {
      throw new RangeError("At least one card source is required");
    }
    return [...options.sources];
  }
  const workers = options?.workers ?? 1;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError("workers must be a positive integer");
  }
  return Array.from({ length: workers }, (_, index) => {
    const seed =
      options?.seed === undefined ? undefined : deriveSeed(options.seed, index);
    return new CardGenerator({ ...options?.generator, seed });
  });
}

export class CardManager {
  private readonly sources: CardSource[];
  private readonly registry = new FingerprintRegistry();
  private readonly maxConsecutiveDuplicates: number;
  private readonly onProgress: ((event: PrepareProgressEvent) => void) | undefined;
  private readonly counters = { attempts: 0, accepted: 0, rejectedDuplicate: 0 };
  private prepared: readonly Card[] = [];
  private cursor = 0;

  constructor(options?: CardManagerOptions) {
    this.sources = buildSources(options);
    const maxDuplicates =
      options?.maxConsecutiveDuplicates ?? DEFAULT_MAX_CONSECUTIVE_DUPLICATES;
    if (!Number.isInteger(maxDuplicates) || maxDuplicates < 1) {
      throw new RangeError("maxConsecutiveDuplicates must be a positive integer");
    }
    this.maxConsecutiveDuplicates = maxDuplicates;
    this.onProgress = options?.onProgress;
  }

  private nextSource(): CardSource {
    const source = this.sources[this.cursor % this.sources.length];
    this.cursor += 1;
    return source;
  }

  prepare(total: number, batchSize: number = DEFAULT_BATCH_SIZE): readonly Card[] {
    if (!Number.isInteger(total) || total < 0) {
      throw new RangeError("total must be a non-negative integer");
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError("batchSize must be a positive integer");
    }

    const cards: Card[] = [];
    let consecutiveDuplicates = 0;
    let batch = 0;
    try {
      while (cards.length < total) {
        batch += 1;
        const size = Math.min(batchSize, total - cards.length);
        const target = cards.length + size;
        this.onProgress?.({
          type: "batch_start",
          batch,
          size,
          remaining: total - cards.length,
        });
        while (cards.length < target) {
          const card = this.nextSource().generateOne();
          this.counters.attempts += 1;
          if (!this.registry.insertIfAbsent(fingerprintCard(card))) {
            this.counters.rejectedDuplicate += 1;
            consecutiveDuplicates += 1;
            this.onProgress?.({ type: "duplicate", batch, consecutive: consecutiveDuplicates });
            if (consecutiveDuplicates >= this.maxConsecutiveDuplicates) {
              throw new ExhaustedSpaceError(
                `Gave up after ${consecutiveDuplicates} consecutive duplicate cards with ${cards.length}/${total} accepted`,
                {
                  requested: total,
                  accepted: cards.length,
                  consecutiveDuplicates,
                  stats: this.stats(),
                }
              );
            }
            continue;
          }
          consecutiveDuplicates = 0;
          this.counters.accepted += 1;
          cards.push(card);
        }
        this.onProgress?.({
          type: "batch_complete",
          batch,
          accepted: cards.length,
          total,
        });
      }
    } finally {
      this.prepared = Object.freeze(cards);
    }
    this.onProgress?.({ type: "complete", total, stats: this.stats() });
    return this.prepared;
  }

  validateUnique(cards: readonly Card[] = this.prepared): boolean {
    const seen = new Set<string>();
    for (const card of cards) {
      const fingerprint = fingerprintCard(card);
      if (seen.has(fingerprint)) {
        return false;
      }
      seen.add(fingerprint);
    }
    return true;
  }

  get(index: number): Card {
    if (!Number.isInteger(index) || index < 0 || index >= this.prepared.length) {
      throw new CardIndexError(index, this.prepared.length);
    }
    return this.prepared[index];
  }

  get cards(): readonly Card[] {
    return this.prepared;
  }

  get size(): number {
    return this.registry.size;
  }

  stats(): GenerationStats {
    const stats = emptyStats();
    this.sources.forEach((source) => {
      const sourceStats = source.stats();
      stats.rejectedInvalid += sourceStats.rejectedInvalid;
      stats.layoutRetries += sourceStats.layoutRetries;
    });
    return { ...stats, ...this.counters };
  }
}

export function generateCardSet(seed: number, count = 6): readonly Card[] {
  return new CardManager({ seed }).prepare(count);
}
