import fs from "fs";
import path from "path";
import { loadCardFile } from "../engine/cards";
import type { Card } from "../engine/types";
import { parseArgs, parseIntegerValue, rejectUnknownFlags, runMain } from "./cli";

const USAGE = `
Usage:
  node dist/scripts/render_cards.js <path/to/cards.json> [options]

Options:
  --columns <n>     Cards printed side by side (default: 2)
  --help, -h        Show this help message
`.trim();

const supportsColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

const color = {
  wrap(code: string, value: string) {
    return supportsColor ? `\u001b[${code}m${value}\u001b[0m` : value;
  },
  bold(value: string) {
    return this.wrap("1", value);
  },
  cyan(value: string) {
    return this.wrap("36", value);
  },
  gray(value: string) {
    return this.wrap("90", value);
  },
};

const CELL_WIDTH = 2;
const SEPARATOR = "  ";

export function cardLines(card: Card): string[] {
  const border = `+${card[0].map(() => "-".repeat(CELL_WIDTH)).join("+")}+`;
  const rows = card.map(
    (row) =>
      `|${row
        .map((cell) => (cell === null ? " ".repeat(CELL_WIDTH) : String(cell).padStart(CELL_WIDTH)))
        .join("|")}|`
  );
  return [border, ...rows, border];
}

export function groupCards(cards: readonly Card[], columns: number): Card[][] {
  const groups: Card[][] = [];
  for (let start = 0; start < cards.length; start += columns) {
    groups.push(cards.slice(start, start + columns));
  }
  return groups;
}

function renderGroup(cards: Card[], firstNumber: number): string[] {
  const blocks = cards.map(cardLines);
  const width = blocks[0][0].length;
  const header = cards
    .map((_, index) => color.cyan(`#${firstNumber + index}`.padEnd(width)))
    .join(SEPARATOR);
  const lines = [header];
  for (let line = 0; line < blocks[0].length; line += 1) {
    lines.push(
      blocks
        .map((block) =>
          line === 0 || line === block.length - 1
            ? color.gray(block[line])
            : block[line]
        )
        .join(SEPARATOR)
    );
  }
  return lines;
}

function main() {
  const { flags, positional } = parseArgs(process.argv.slice(2), {
    shortBooleanFlags: ["h"],
  });
  if (flags.help || flags.h) {
    console.log(USAGE);
    return;
  }
  rejectUnknownFlags(flags, ["columns", "help", "h"]);
  const input = positional[0];
  if (!input) {
    throw new Error("Missing path to a cards JSON file.");
  }
  const filePath = path.resolve(input);
  if (!fs.existsSync(filePath)) {
    throw new Error(`Cards file not found: ${filePath}`);
  }
  const columns = parseIntegerValue(flags.columns, 2, "columns", 1);

  const { round, cards } = loadCardFile(filePath);
  const title = round ? `Round ${round}` : "Cards";
  console.log(color.bold(`${title} · ${cards.length} cards`));
  groupCards(cards, columns).forEach((group, index) => {
    console.log("");
    renderGroup(group, index * columns + 1).forEach((line) => console.log(line));
  });
}

if (require.main === module) {
  runMain(main);
}
