// ─── Command Parser ────────────────────────────────────────────────
// Turns a line of player input into a GameAction, and a color prompt
// answer into a palette Color. Pure functions; prompting lives in the
// caller.

import { ColorSchema } from "@color-match/schema";
import type { Color, GameAction } from "../types/index";
import { ERROR_MESSAGES } from "./play-validator";

export type ParseCommandResult =
  | { readonly ok: true; readonly action: GameAction }
  | { readonly ok: false; readonly error: string };

/**
 * Splits the line at its first space into a verb and an argument.
 * The verb is case-insensitive; the argument (the card name for
 * `play`) is kept verbatim.
 *
 * @example
 * parseCommand("PLAY Red7") // { ok: true, action: { kind: "play", cardName: "Red7" } }
 */
export function parseCommand(line: string): ParseCommandResult {
  const space = line.indexOf(" ");
  const verb = (space === -1 ? line : line.slice(0, space)).toLowerCase();
  const argument = space === -1 ? null : line.slice(space + 1);

  switch (verb) {
    case "play":
      if (argument !== null) {
        return { ok: true, action: { kind: "play", cardName: argument } };
      }
      break;
    case "draw":
      return { ok: true, action: { kind: "draw" } };
    case "pass":
      return { ok: true, action: { kind: "pass" } };
  }

  return { ok: false, error: ERROR_MESSAGES.invalid_action };
}

export type ColorChoiceResult =
  | { readonly ok: true; readonly color: Color }
  | { readonly ok: false };

/**
 * Accepts exactly one of the palette names ("Red", "Green", "Blue",
 * "Yellow"). Anything else asks the caller to prompt again.
 */
export function parseColorChoice(input: string): ColorChoiceResult {
  const result = ColorSchema.safeParse(input);
  return result.success ? { ok: true, color: result.data } : { ok: false };
}
