// ─── Game Session ──────────────────────────────────────────────────
// Drives one game from line input: asks for a seed, prompts the
// current player, feeds parsed actions to the engine, and prints the
// events it returns. Knows nothing about stdin or stdout.

import {
  COLOR_PROMPT,
  SEED_PROMPT,
  actionPrompt,
  applyAction,
  createInitialState,
  formatEvent,
  formatOpening,
  parseColorChoice,
  parseCommand,
} from "@color-match/shared";
import type {
  GameAction,
  GameConfig,
  GameEvent,
  GameState,
} from "@color-match/shared";

/** Line-oriented input and output for a session. */
export interface SessionIO {
  /** Shows `prompt` and resolves with the next line, or null once input ends. */
  readLine(prompt: string): Promise<string | null>;
  writeLine(line: string): void;
}

export interface SessionOptions {
  /** When omitted the session asks for one. */
  readonly seed?: string;
  readonly config: GameConfig;
}

export type SessionResult =
  | { readonly kind: "finished"; readonly state: GameState }
  | { readonly kind: "aborted"; readonly state: GameState | null };

/**
 * Plays until the game finishes or input runs out. An unrecognised
 * command prints the usage message; an unrecognised color re-prompts.
 */
export async function runSession(
  io: SessionIO,
  options: SessionOptions
): Promise<SessionResult> {
  const seed = options.seed ?? (await io.readLine(SEED_PROMPT));
  if (seed === null) {
    return { kind: "aborted", state: null };
  }

  let state = createInitialState({
    seed,
    players: options.config.players,
    cardsPerPlayer: options.config.cardsPerPlayer,
  });
  formatOpening(state).forEach((line) => io.writeLine(line));

  while (state.status.kind !== "finished") {
    const action = await nextAction(io, state);
    if (action === null) {
      return { kind: "aborted", state };
    }

    const outcome = applyAction(state, action);
    render(io, outcome.events);
    state = outcome.state;
  }

  return { kind: "finished", state };
}

// ─── Input ─────────────────────────────────────────────────────────

/** Prompts until the input parses to an action; null once input ends. */
async function nextAction(
  io: SessionIO,
  state: GameState
): Promise<GameAction | null> {
  for (;;) {
    if (state.status.kind === "awaiting_color") {
      const line = await io.readLine(COLOR_PROMPT);
      if (line === null) return null;

      const choice = parseColorChoice(line);
      if (choice.ok) {
        return { kind: "choose_color", color: choice.color };
      }
      continue;
    }

    const line = await io.readLine(actionPrompt(state.currentPlayerIndex));
    if (line === null) return null;

    const parsed = parseCommand(line);
    if (parsed.ok) {
      return parsed.action;
    }
    io.writeLine(parsed.error);
  }
}

function render(io: SessionIO, events: readonly GameEvent[]): void {
  for (const event of events) {
    const line = formatEvent(event);
    if (line !== null) {
      io.writeLine(line);
    }
  }
}
