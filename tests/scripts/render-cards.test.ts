import test from "node:test";
import assert from "node:assert/strict";
import { cardLines, groupCards } from "../../scripts/render_cards";
import { validCard, variantCard } from "../engine/helpers";

test("cardLines draws a bordered 3x9 grid", () => {
  assert.deepEqual(cardLines(validCard()), [
    "+--+--+--+--+--+--+--+--+--+",
    "| 1|10|20|30|  |  |  |  |80|",
    "| 5|15|  |  |  |50|60|70|  |",
    "|  |  |25|35|40|  |  |75|90|",
    "+--+--+--+--+--+--+--+--+--+",
  ]);
});

test("groupCards splits cards into rows of the requested width", () => {
  const cards = [0, 1, 2, 3].map(variantCard);
  const groups = groupCards(cards, 3);
  assert.equal(groups.length, 2);
  assert.deepEqual(groups[0], cards.slice(0, 3));
  assert.deepEqual(groups[1], [cards[3]]);
  assert.deepEqual(groupCards(cards, 4), [cards]);
  assert.deepEqual(groupCards([], 2), []);
});
