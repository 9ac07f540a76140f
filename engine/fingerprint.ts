import { createHash } from "crypto";
import type { Card } from "./types";

const EMPTY_SENTINEL = 0;

export function serializeCard(card: Card): string {
  return card
    .map((row) => row.map((cell) => cell ?? EMPTY_SENTINEL).join(","))
    .join(",");
}

export function fingerprintCard(card: Card): string {
  return createHash("sha256").update(serializeCard(card)).digest("hex");
}

export function findDuplicates(cards: readonly Card[]): Array<[number, number]> {
  const firstSeen = new Map<string, number>();
  const duplicates: Array<[number, number]> = [];
  cards.forEach((card, index) => {
    const fingerprint = fingerprintCard(card);
    const first = firstSeen.get(fingerprint);
    if (first === undefined) {
      firstSeen.set(fingerprint, index);
    } else {
      duplicates.push([first, index]);
    }
  });
  return duplicates;
}
