// ─── Game State, Actions & Events ──────────────────────────────────
// Runtime state of a game in progress, the actions that advance it,
// and the display events the engine emits back to its caller.
// State is always immutable — the engine returns a new state.

import type { Card, Color } from "./card";

// ─── Game Status ───────────────────────────────────────────────────

/** How a finished game ended. */
export type GameOutcome =
  | { readonly kind: "win"; readonly playerIndex: number }
  | { readonly kind: "tie" };

/**
 * Discriminated union for game lifecycle.
 * Each status carries only the data relevant to that stage.
 */
export type GameStatus =
  | { readonly kind: "in_progress" }
  | { readonly kind: "awaiting_color"; readonly playerIndex: number }
  | { readonly kind: "finished"; readonly outcome: GameOutcome };

// ─── Actions ───────────────────────────────────────────────────────

/**
 * All possible game actions as a discriminated union.
 * Each variant carries exactly the data needed — no optional fields.
 */
export type GameAction =
  | { readonly kind: "play"; readonly cardName: string }
  | { readonly kind: "choose_color"; readonly color: Color }
  | { readonly kind: "draw" }
  | { readonly kind: "pass" };

/**
 * An action that has been validated and applied.
 * Stored in the append-only action log.
 */
export interface ResolvedAction {
  readonly action: GameAction;
  readonly playerIndex: number;
  readonly version: number;
}

// ─── Game State ────────────────────────────────────────────────────

/**
 * The complete state of a game at a point in time. Replaying
 * `actionLog` against a fresh game with the same seed rebuilds it.
 */
export interface GameState {
  readonly seed: string;
  /** Undealt cards. Cards are drawn from the front. */
  readonly drawPile: readonly Card[];
  /** One hand per player, indexed by player index. */
  readonly hands: readonly (readonly Card[])[];
  /** Played cards, bottom to top. */
  readonly discardPile: readonly Card[];
  /** Active color for matching; null until the first play. */
  readonly currentColor: Color | null;
  readonly currentPlayerIndex: number;
  /** Whether the current player has used their one draw this turn. */
  readonly hasDrawn: boolean;
  /** Starts at 1 and increments every time the turn passes. */
  readonly turnNumber: number;
  readonly status: GameStatus;
  readonly actionLog: readonly ResolvedAction[];
  /** Monotonically increasing version, bumped per accepted action. */
  readonly version: number;
}

// ─── Errors ────────────────────────────────────────────────────────

/** Why an action was rejected. */
export type GameErrorCode =
  | "card_not_in_hand"
  | "card_not_playable"
  | "already_drawn"
  | "must_draw_first"
  | "invalid_action"
  | "awaiting_color"
  | "not_awaiting_color"
  | "game_over";

// ─── Events ────────────────────────────────────────────────────────

/**
 * Display requests emitted by the engine, in the order the caller
 * should render them.
 */
export type GameEvent =
  | {
      readonly kind: "hand";
      readonly playerIndex: number;
      readonly cards: readonly Card[];
    }
  | { readonly kind: "top_card"; readonly card: Card }
  | { readonly kind: "color_requested"; readonly playerIndex: number }
  | {
      readonly kind: "error";
      readonly code: GameErrorCode;
      readonly message: string;
    }
  | { readonly kind: "game_over"; readonly outcome: GameOutcome };

/** The new state plus the events produced while reaching it. */
export interface ActionOutcome {
  readonly state: GameState;
  readonly events: readonly GameEvent[];
}

// ─── Special Effects ───────────────────────────────────────────────

/**
 * What a special card does to turn order. The resolver never reports
 * a win; wins are decided before it runs.
 */
export type SpecialEffectResult =
  | { readonly kind: "continue"; readonly nextPlayer: number }
  | { readonly kind: "tie" };
