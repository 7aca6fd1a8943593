// ─── Dealing ───────────────────────────────────────────────────────
// Round-robin dealing and front-of-pile drawing. Inputs are never
// mutated; every function returns the new piles.

import { DEFAULT_CARDS_PER_PLAYER, DEFAULT_PLAYERS } from "@color-match/schema";
import type { Card } from "../types/index";

export interface DealResult {
  readonly deck: readonly Card[];
  readonly hands: readonly (readonly Card[])[];
}

/**
 * Deals one card to each player per round, for `cardsPerPlayer`
 * rounds. When the deck runs out mid-deal the remaining players
 * simply receive fewer cards.
 */
export function dealCards(
  deck: readonly Card[],
  numPlayers: number = DEFAULT_PLAYERS,
  cardsPerPlayer: number = DEFAULT_CARDS_PER_PLAYER
): DealResult {
  const hands: Card[][] = Array.from({ length: numPlayers }, () => []);
  let position = 0;

  for (let round = 0; round < cardsPerPlayer; round++) {
    for (const hand of hands) {
      const card = deck[position];
      if (card === undefined) break;
      hand.push(card);
      position++;
    }
  }

  return { deck: deck.slice(position), hands };
}

/**
 * Takes up to `count` cards from the front of the pile.
 * `drawn` is shorter than `count` when the pile runs out.
 */
export function drawFromFront(
  pile: readonly Card[],
  count: number
): { readonly drawn: readonly Card[]; readonly remaining: readonly Card[] } {
  return { drawn: pile.slice(0, count), remaining: pile.slice(count) };
}
