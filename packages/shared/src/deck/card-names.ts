// ─── Card Names ────────────────────────────────────────────────────
// Rendering cards as the names players type, and looking them up again.

import type { Card } from "../types/index";

/**
 * Renders a card as its player-facing name.
 *
 * @example
 * cardToString({ kind: "number", id: "c0", color: "Red", number: 7 }) // "Red7"
 * cardToString({ kind: "wild", id: "c96", color: null, special: "Wild" }) // "Wild"
 */
export function cardToString(card: Card): string {
  switch (card.kind) {
    case "number":
      return `${card.color}${card.number}`;
    case "action":
      return `${card.color}${card.special}`;
    case "wild":
      return card.color === null
        ? card.special
        : `${card.color}${card.special}`;
  }
}

/**
 * Index of the first card in the hand whose name is exactly `name`,
 * or null when no card matches.
 */
export function findCardInHand(
  hand: readonly Card[],
  name: string
): number | null {
  const index = hand.findIndex((card) => cardToString(card) === name);
  return index === -1 ? null : index;
}

/** Space-joined card names, in hand order. */
export function formatHand(hand: readonly Card[]): string {
  return hand.map(cardToString).join(" ");
}
