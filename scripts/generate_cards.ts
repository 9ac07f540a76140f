import fs from "fs";
import path from "path";
import {
  CardManager,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_CONSECUTIVE_DUPLICATES,
  type PrepareProgressEvent,
} from "../generator/manager";
import { createSeed } from "../generator/rng";
import {
  parseArgs,
  parseIntegerValue,
  parseStringValue,
  rejectUnknownFlags,
  runMain,
} from "./cli";

const DEFAULTS = {
  total: 6,
  batchSize: DEFAULT_BATCH_SIZE,
  workers: 1,
  maxDuplicates: DEFAULT_MAX_CONSECUTIVE_DUPLICATES,
} as const;

const USAGE = `
Usage:
  node dist/scripts/generate_cards.js [--options]

Options:
  --total <n>            Unique cards to generate (default: ${DEFAULTS.total})
  --batch-size <n>       Cards per progress batch (default: ${DEFAULTS.batchSize})
  --seed <n>             Session seed (default: clock + OS entropy)
  --workers <n>          Independent generators sharing the registry (default: ${DEFAULTS.workers})
  --round <label>        Round label copied into the output
  --max-duplicates <n>   Consecutive duplicates before giving up (default: ${DEFAULTS.maxDuplicates})
  --output <path>        Also write the JSON to this path
  --verbose, -v          Print progress to stderr
  --help, -h             Show this help message
`.trim();

const ALLOWED_FLAGS = [
  "total",
  "batch-size",
  "seed",
  "workers",
  "round",
  "max-duplicates",
  "output",
  "verbose",
  "v",
  "help",
  "h",
];

export function describeProgress(event: PrepareProgressEvent): string | null {
  switch (event.type) {
    case "batch_start":
      return `[cards] batch ${event.batch} · ${event.size} cards · ${event.remaining} remaining`;
    case "duplicate":
      return event.consecutive > 1
        ? `[cards] batch ${event.batch} · ${event.consecutive} duplicates in a row`
        : null;
    case "batch_complete":
      return `[cards] batch ${event.batch} done · ${event.accepted}/${event.total}`;
    case "complete": {
      const { attempts, rejectedDuplicate, rejectedInvalid } = event.stats;
      return `[cards] ${event.total} unique cards · ${attempts} drawn · ${rejectedDuplicate} duplicates · ${rejectedInvalid} invalid`;
    }
  }
}

function main() {
  const { flags, positional } = parseArgs(process.argv.slice(2), {
    shortBooleanFlags: ["h", "v"],
  });
  if (flags.help || flags.h) {
    console.log(USAGE);
    return;
  }
  if (positional.length > 0) {
    throw new Error("Positional arguments are not supported. Use named flags only.");
  }
  rejectUnknownFlags(flags, ALLOWED_FLAGS);

  const verbose = Boolean(flags.verbose || flags.v);
  const total = parseIntegerValue(flags.total, DEFAULTS.total, "total", 0);
  const batchSize = parseIntegerValue(
    flags["batch-size"],
    DEFAULTS.batchSize,
    "batch-size",
    1
  );
  const seed = parseIntegerValue(flags.seed, createSeed(), "seed", 0);
  const workers = parseIntegerValue(flags.workers, DEFAULTS.workers, "workers", 1);
  const maxDuplicates = parseIntegerValue(
    flags["max-duplicates"],
    DEFAULTS.maxDuplicates,
    "max-duplicates",
    1
  );
  const round = parseStringValue(flags.round, "round");
  const output = parseStringValue(flags.output, "output");

  const manager = new CardManager({
    seed,
    workers,
    maxConsecutiveDuplicates: maxDuplicates,
    onProgress: verbose
      ? (event) => {
          const line = describeProgress(event);
          if (line) {
            console.error(line);
          }
        }
      : undefined,
  });
  const cards = manager.prepare(total, batchSize);
  if (!manager.validateUnique(cards)) {
    throw new Error("Prepared cards failed the uniqueness check.");
  }

  const json = JSON.stringify({ round, seed, total: cards.length, cards }, null, 2);
  if (output) {
    const resolved = path.resolve(output);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, json, "utf8");
    if (verbose) {
      console.error(`[cards] wrote ${resolved}`);
    }
  }
  console.log(json);
}

if (require.main === module) {
  runMain(main);
}
