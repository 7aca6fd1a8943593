// ─── Display Formatting ────────────────────────────────────────────
// Renders engine events and prompts as terminal text. Player numbers
// are shown 1-based.

import { cardToString, formatHand } from "../deck/card-names";
import type { Color, GameEvent, GameOutcome, GameState } from "../types/index";

/** Shown in place of a top card before anything has been played. */
export const NO_TOP_CARD = "__";

export const SEED_PROMPT = "What seed do you want to use for the game? ";

/** The palette in the order the color prompt lists it. */
export const PROMPT_COLORS: readonly Color[] = ["Blue", "Red", "Green", "Yellow"];

export const COLOR_PROMPT = `Select a color [${PROMPT_COLORS.join(", ")}] `;

export function actionPrompt(playerIndex: number): string {
  return `Player ${playerIndex + 1}, what would you like to do? `;
}

export function formatOutcome(outcome: GameOutcome): string {
  switch (outcome.kind) {
    case "win":
      return `Congratulations Player ${outcome.playerIndex + 1}! You Won!`;
    case "tie":
      return "Draw pile is empty! Game ends in a tie.";
  }
}

/**
 * The text line for an event, or null for events that produce a
 * prompt instead of output.
 */
export function formatEvent(event: GameEvent): string | null {
  switch (event.kind) {
    case "hand":
      return formatHand(event.cards);
    case "top_card":
      return `The top card is:  ${cardToString(event.card)}`;
    case "color_requested":
      return null;
    case "error":
      return event.message;
    case "game_over":
      return formatOutcome(event.outcome);
  }
}

/** Lines shown before the first action: the empty table and hand 1. */
export function formatOpening(state: GameState): readonly string[] {
  return [NO_TOP_CARD, formatHand(state.hands[0] ?? [])];
}

