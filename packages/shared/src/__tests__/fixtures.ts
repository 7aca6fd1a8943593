// ─── Test Fixtures ─────────────────────────────────────────────────
// Card and state factories shared by the engine tests.

import type {
  ActionCard,
  CardNumber,
  Color,
  ColoredSpecial,
  GameState,
  NumberCard,
  WildCard,
  WildSpecial,
} from "../types/index";

let nextId = 0;

function makeId(): string {
  nextId += 1;
  return `t${nextId}`;
}

export function numberCard(color: Color, number: CardNumber): NumberCard {
  return { kind: "number", id: makeId(), color, number };
}

export function actionCard(color: Color, special: ColoredSpecial): ActionCard {
  return { kind: "action", id: makeId(), color, special };
}

export function wildCard(
  special: WildSpecial,
  color: Color | null = null
): WildCard {
  return { kind: "wild", id: makeId(), color, special };
}

/** A two-player, in-progress state with empty piles unless overridden. */
export function makeState(overrides: Partial<GameState> = {}): GameState {
  return {
    seed: "test",
    drawPile: [],
    hands: [[], []],
    discardPile: [],
    currentColor: null,
    currentPlayerIndex: 0,
    hasDrawn: false,
    turnNumber: 1,
    status: { kind: "in_progress" },
    actionLog: [],
    version: 0,
    ...overrides,
  };
}
