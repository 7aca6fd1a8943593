// ─── Deck Presets ──────────────────────────────────────────────────
// Factory for the color-matching deck. Produces fresh Card objects in
// a fixed, unshuffled order; instance IDs follow that order.

import {
  CARD_NUMBERS,
  COLORED_SPECIALS,
  COLORS,
  WILD_SPECIALS,
} from "@color-match/schema";
import type { Card } from "../types/index";

/** Copies of each digit per color. */
const NUMBER_COPIES = 2;

/** Copies of each colored special per color. */
const COLORED_SPECIAL_COPIES = 2;

/** Copies of each wild special. */
const WILD_SPECIAL_COPIES = 4;

/** Total cards produced by `createDeck`. */
export const DECK_SIZE =
  COLORS.length * CARD_NUMBERS.length * NUMBER_COPIES +
  COLORED_SPECIALS.length * COLORS.length * COLORED_SPECIAL_COPIES +
  WILD_SPECIALS.length * WILD_SPECIAL_COPIES;

/**
 * Color-matching 104-card deck.
 * Two passes over the digits 0–9, each digit dealt across the four
 * colors in palette order; then two Skip and two DrawTwo per color;
 * then four colorless Wild and four colorless WildDrawFour.
 */
export function createDeck(): Card[] {
  const cards: Card[] = [];
  const nextId = () => `c${cards.length}`;

  for (let copy = 0; copy < NUMBER_COPIES; copy++) {
    for (const number of CARD_NUMBERS) {
      for (const color of COLORS) {
        cards.push({ kind: "number", id: nextId(), color, number });
      }
    }
  }

  for (const special of COLORED_SPECIALS) {
    for (const color of COLORS) {
      for (let copy = 0; copy < COLORED_SPECIAL_COPIES; copy++) {
        cards.push({ kind: "action", id: nextId(), color, special });
      }
    }
  }

  for (const special of WILD_SPECIALS) {
    for (let copy = 0; copy < WILD_SPECIAL_COPIES; copy++) {
      cards.push({ kind: "wild", id: nextId(), color: null, special });
    }
  }

  return cards;
}
