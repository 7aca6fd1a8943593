// ─── Play Validator ────────────────────────────────────────────────
// Decides whether a card may go on the discard pile, and whether an
// action is legal in the current state. Prevents illegal moves at the
// engine level.

import { findCardInHand } from "../deck/card-names";
import type {
  Card,
  Color,
  GameAction,
  GameErrorCode,
  GameState,
} from "../types/index";

/**
 * A card is playable on `topCard` when any of these holds:
 * it is a wild; its color is the active color; both cards are
 * numbered with the same digit; or both are colored specials of the
 * same kind (Skip on Skip, DrawTwo on DrawTwo).
 */
export function isValidPlay(
  card: Card,
  topCard: Card,
  currentColor: Color | null
): boolean {
  if (card.kind === "wild") return true;

  if (card.color === currentColor) return true;

  // Digits match across colors
  if (
    card.kind === "number" &&
    topCard.kind === "number" &&
    card.number === topCard.number
  ) {
    return true;
  }

  if (
    card.kind === "action" &&
    topCard.kind === "action" &&
    card.special === topCard.special
  ) {
    return true;
  }

  return false;
}

/** Discriminated validation result — success or failure with reason. */
export type ActionValidationResult =
  | { readonly valid: true }
  | {
      readonly valid: false;
      readonly code: GameErrorCode;
      readonly reason: string;
    };

/** Player-facing messages for each rejection. */
export const ERROR_MESSAGES: Readonly<Record<GameErrorCode, string>> = {
  card_not_in_hand: "That card is not in your hand.",
  card_not_playable: "That card didn't match in number or color.",
  already_drawn: "You can only draw once per turn.",
  must_draw_first: "You must draw a card before passing.",
  invalid_action: "Invalid action. Use 'play [CardName]', 'draw', or 'pass'.",
  awaiting_color: "Choose a color first.",
  not_awaiting_color: "There is no wild card waiting for a color.",
  game_over: "The game is over.",
};

function reject(code: GameErrorCode): ActionValidationResult {
  return { valid: false, code, reason: ERROR_MESSAGES[code] };
}

/**
 * Validates whether a specific action is legal in the current state.
 * Returns a discriminated result — not a boolean — so callers get
 * the rejection reason without a separate error channel.
 *
 * Drawing from an empty pile is legal: it ends the game in a tie.
 */
export function validateAction(
  state: GameState,
  action: GameAction
): ActionValidationResult {
  if (state.status.kind === "finished") {
    return reject("game_over");
  }

  if (state.status.kind === "awaiting_color") {
    return action.kind === "choose_color"
      ? { valid: true }
      : reject("awaiting_color");
  }

  switch (action.kind) {
    case "choose_color":
      return reject("not_awaiting_color");

    case "play":
      return validatePlay(state, action.cardName);

    case "draw":
      return state.hasDrawn ? reject("already_drawn") : { valid: true };

    case "pass":
      return state.hasDrawn ? { valid: true } : reject("must_draw_first");
  }
}

/**
 * The card must be in the current hand. It must also match the
 * discard pile, except on the first play of the game.
 */
function validatePlay(
  state: GameState,
  cardName: string
): ActionValidationResult {
  const hand = state.hands[state.currentPlayerIndex] ?? [];
  const index = findCardInHand(hand, cardName);
  const card = index === null ? undefined : hand[index];
  if (card === undefined) {
    return reject("card_not_in_hand");
  }

  const topCard = state.discardPile[state.discardPile.length - 1];
  if (topCard !== undefined && !isValidPlay(card, topCard, state.currentColor)) {
    return reject("card_not_playable");
  }

  return { valid: true };
}
