import fs from "fs";
import path from "path";
import { loadCardFile } from "../engine/cards";
import { findDuplicates } from "../engine/fingerprint";
import { validateCard } from "../engine/validate";
import type { Card } from "../engine/types";
import { parseArgs, rejectUnknownFlags, runMain } from "./cli";

const USAGE = `
Usage:
  node dist/scripts/verify_cards.js <path/to/cards.json>

Checks every card against the layout rules and reports duplicates.
Exits with code 1 when any card fails.
`.trim();

export interface VerifyReport {
  total: number;
  invalid: Array<{ index: number; issues: string[] }>;
  duplicates: Array<[number, number]>;
}

export function verifyCards(cards: readonly Card[]): VerifyReport {
  const invalid: VerifyReport["invalid"] = [];
  cards.forEach((card, index) => {
    const issues = validateCard(card);
    if (issues.length > 0) {
      invalid.push({ index, issues });
    }
  });
  return { total: cards.length, invalid, duplicates: findDuplicates(cards) };
}

function main() {
  const { flags, positional } = parseArgs(process.argv.slice(2), {
    shortBooleanFlags: ["h"],
  });
  if (flags.help || flags.h) {
    console.log(USAGE);
    return;
  }
  rejectUnknownFlags(flags, ["help", "h"]);
  const input = positional[0];
  if (!input) {
    throw new Error("Missing path to a cards JSON file.");
  }
  const filePath = path.resolve(input);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Cards file not found: ${filePath}`);
  }

  const report = verifyCards(loadCardFile(filePath).cards);
  report.invalid.forEach(({ index, issues }) => {
    console.error(`Card ${index}: ${issues.join("; ")}`);
  });
  report.duplicates.forEach(([first, repeat]) => {
    console.error(`Card ${repeat} duplicates card ${first}`);
  });

  console.log(
    `${report.total} cards · ${report.invalid.length} invalid · ${report.duplicates.length} duplicates`
  );
  if (report.invalid.length > 0 || report.duplicates.length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  runMain(main);
}
