import { createCard } from "../../engine/cards";
import { emptyStats, type Card, type CardSource, type Cell } from "../../engine/types";

export const VALID_ROWS: Cell[][] = [
  [1, 10, 20, 30, null, null, null, null, 80],
  [5, 15, null, null, null, 50, 60, 70, null],
  [null, null, 25, 35, 40, null, null, 75, 90],
];

export function rowsCopy(): Cell[][] {
  return VALID_ROWS.map((row) => [...row]);
}

export function validCard(): Card {
  return createCard(VALID_ROWS);
}

/** Valid cards that differ only in the top-left value (1..4). */
export function variantCard(offset: number): Card {
  const rows = rowsCopy();
  rows[0][0] = 1 + offset;
  return createCard(rows);
}

export class ListSource implements CardSource {
  private index = 0;
  private readonly cards: Card[];

  constructor(cards: Card[]) {
    this.cards = cards;
  }

  generateOne(): Card {
    const card = this.cards[this.index % this.cards.length];
    this.index += 1;
    return card;
  }

  stats() {
    return emptyStats();
  }
}
