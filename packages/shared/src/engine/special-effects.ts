// ─── Special-Effect Resolver ───────────────────────────────────────
// Turn-order and forced-draw consequences of Skip, DrawTwo, Wild and
// WildDrawFour. Only called for cards that carry a special.

import { drawFromFront } from "../deck/deal";
import type {
  Card,
  SpecialCard,
  SpecialEffectResult,
} from "../types/index";

/** Cards the next player must take for each drawing special. */
export const DRAW_PENALTIES = {
  DrawTwo: 2,
  WildDrawFour: 4,
} as const;

export interface SpecialEffectResolution {
  readonly result: SpecialEffectResult;
  readonly drawPile: readonly Card[];
  readonly hands: readonly (readonly Card[])[];
}

/**
 * Resolves a special card played by `currentPlayer`.
 *
 * - Skip: the next player loses their turn.
 * - DrawTwo / WildDrawFour: the next player draws 2 / 4 from the front
 *   of the pile and loses their turn. If the pile runs out first, the
 *   cards already drawn stay in that hand and the game ends in a tie.
 * - Wild: play passes to the next player.
 */
export function resolveSpecialCard(
  card: SpecialCard,
  drawPile: readonly Card[],
  hands: readonly (readonly Card[])[],
  currentPlayer: number
): SpecialEffectResolution {
  const playerCount = hands.length;
  const nextPlayer = (currentPlayer + 1) % playerCount;
  const skipPlayer = (currentPlayer + 2) % playerCount;

  switch (card.special) {
    case "Skip":
      return {
        result: { kind: "continue", nextPlayer: skipPlayer },
        drawPile,
        hands,
      };

    case "DrawTwo":
    case "WildDrawFour": {
      const penalty = DRAW_PENALTIES[card.special];
      const { drawn, remaining } = drawFromFront(drawPile, penalty);
      const updatedHands = hands.map((hand, i) =>
        i === nextPlayer ? [...hand, ...drawn] : hand
      );
      const result: SpecialEffectResult =
        drawn.length < penalty
          ? { kind: "tie" }
          : { kind: "continue", nextPlayer: skipPlayer };
      return { result, drawPile: remaining, hands: updatedHands };
    }

    case "Wild":
      return {
        result: { kind: "continue", nextPlayer },
        drawPile,
        hands,
      };
  }
}
