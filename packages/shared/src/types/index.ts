// Re-export all types from the canonical schema package.
export type { ActionCard, Card, CardNumber, Color, ColoredSpecial, NumberCard, Special, SpecialCard, WildCard, WildSpecial } from "@color-match/schema";
export type { ActionOutcome, GameAction, GameErrorCode, GameEvent, GameOutcome, GameState, GameStatus, ResolvedAction, SpecialEffectResult } from "@color-match/schema";
export type { GameConfig } from "@color-match/schema";
