// ─── Turn Engine ───────────────────────────────────────────────────
// Creates the initial game state and applies player actions to it.
// Every call returns a new state plus the display events the caller
// should render; invalid input becomes an "error" event, never a throw.

import {
  DEFAULT_CARDS_PER_PLAYER,
  DEFAULT_PLAYERS,
} from "@color-match/schema";
import type {
  ActionOutcome,
  Card,
  GameAction,
  GameErrorCode,
  GameEvent,
  GameOutcome,
  GameState,
  WildCard,
} from "../types/index";
import { createDeck } from "../deck/presets";
import { findCardInHand } from "../deck/card-names";
import { dealCards, drawFromFront } from "../deck/deal";
import { createRng } from "./prng";
import { ERROR_MESSAGES, validateAction } from "./play-validator";
import { resolveSpecialCard } from "./special-effects";

// ─── createInitialState ────────────────────────────────────────────

export interface GameOptions {
  /** Any string; the same seed always produces the same deal. */
  readonly seed: string;
  readonly players?: number;
  readonly cardsPerPlayer?: number;
}

/**
 * Shuffles a fresh deck with the seed, deals the hands, and returns a
 * state with player 0 to act and an empty discard pile.
 *
 * @throws {RangeError} if fewer than 2 players or a negative hand size.
 */
export function createInitialState(options: GameOptions): GameState {
  const {
    seed,
    players = DEFAULT_PLAYERS,
    cardsPerPlayer = DEFAULT_CARDS_PER_PLAYER,
  } = options;

  if (!Number.isInteger(players) || players < 2) {
    throw new RangeError(`A game requires at least 2 players, got ${players}`);
  }
  if (!Number.isInteger(cardsPerPlayer) || cardsPerPlayer < 0) {
    throw new RangeError(
      `cardsPerPlayer must be a non-negative integer, got ${cardsPerPlayer}`
    );
  }

  const rng = createRng(seed);
  const { deck, hands } = dealCards(
    rng.shuffle(createDeck()),
    players,
    cardsPerPlayer
  );

  return {
    seed,
    drawPile: deck,
    hands,
    discardPile: [],
    currentColor: null,
    currentPlayerIndex: 0,
    hasDrawn: false,
    turnNumber: 1,
    status: { kind: "in_progress" },
    actionLog: [],
    version: 0,
  };
}

// ─── applyAction ───────────────────────────────────────────────────

/**
 * Applies one action for the current player. Rejected actions return
 * the same state object with a single "error" event.
 */
export function applyAction(
  state: GameState,
  action: GameAction
): ActionOutcome {
  const validation = validateAction(state, action);
  if (!validation.valid) {
    return {
      state,
      events: [
        { kind: "error", code: validation.code, message: validation.reason },
      ],
    };
  }

  switch (action.kind) {
    case "play":
      return handlePlay(state, action);
    case "choose_color":
      return handleChooseColor(state, action);
    case "draw":
      return handleDraw(state);
    case "pass":
      return handlePass(state);
  }
}

/**
 * Starts a game from `options` and applies each action in order.
 * The same options and actions always yield the same state and events.
 */
export function replayGame(
  options: GameOptions,
  actions: readonly GameAction[]
): ActionOutcome {
  let state = createInitialState(options);
  const events: GameEvent[] = [];
  for (const action of actions) {
    const outcome = applyAction(state, action);
    state = outcome.state;
    events.push(...outcome.events);
  }
  return { state, events };
}

// ─── Action Handlers ───────────────────────────────────────────────

/**
 * Moves the named card to the discard pile. Wild cards pause the turn
 * until a color is chosen; everything else resolves immediately.
 */
function handlePlay(
  state: GameState,
  action: Extract<GameAction, { kind: "play" }>
): ActionOutcome {
  const playerIndex = state.currentPlayerIndex;
  const hand = state.hands[playerIndex] ?? [];
  const index = findCardInHand(hand, action.cardName);
  const card = index === null ? undefined : hand[index];
  if (card === undefined) {
    return rejected(state, "card_not_in_hand");
  }

  const played: GameState = {
    ...state,
    ...logAction(state, action),
    hands: replaceHand(
      state.hands,
      playerIndex,
      hand.filter((_, i) => i !== index)
    ),
    discardPile: [...state.discardPile, card],
  };

  if (card.kind === "wild") {
    return {
      state: { ...played, status: { kind: "awaiting_color", playerIndex } },
      events: [{ kind: "color_requested", playerIndex }],
    };
  }

  return finishPlay({ ...played, currentColor: card.color }, card);
}

/**
 * Paints the wild card on top of the discard pile with the chosen
 * color, makes that color active, and resolves the play.
 */
function handleChooseColor(
  state: GameState,
  action: Extract<GameAction, { kind: "choose_color" }>
): ActionOutcome {
  const topCard = state.discardPile[state.discardPile.length - 1];
  if (topCard === undefined || topCard.kind !== "wild") {
    return rejected(state, "not_awaiting_color");
  }

  const colored: WildCard = { ...topCard, color: action.color };
  return finishPlay(
    {
      ...state,
      ...logAction(state, action),
      discardPile: [...state.discardPile.slice(0, -1), colored],
      currentColor: action.color,
      status: { kind: "in_progress" },
    },
    colored
  );
}

/**
 * Draws one card into the current hand without ending the turn.
 * An empty draw pile ends the game in a tie.
 */
function handleDraw(state: GameState): ActionOutcome {
  const playerIndex = state.currentPlayerIndex;
  const logged: GameState = { ...state, ...logAction(state, { kind: "draw" }) };
  const { drawn, remaining } = drawFromFront(state.drawPile, 1);
  const card = drawn[0];

  if (card === undefined) {
    return endGame(logged, { kind: "tie" }, []);
  }

  const hand = [...(state.hands[playerIndex] ?? []), card];
  return {
    state: {
      ...logged,
      drawPile: remaining,
      hands: replaceHand(state.hands, playerIndex, hand),
      hasDrawn: true,
    },
    events: [{ kind: "hand", playerIndex, cards: hand }],
  };
}

/** Ends the turn after a draw. */
function handlePass(state: GameState): ActionOutcome {
  const topCard = state.discardPile[state.discardPile.length - 1];
  const events: GameEvent[] =
    topCard === undefined ? [] : [{ kind: "top_card", card: topCard }];

  return advanceTo(
    { ...state, ...logAction(state, { kind: "pass" }) },
    (state.currentPlayerIndex + 1) % state.hands.length,
    events
  );
}

// ─── Turn Resolution ───────────────────────────────────────────────

/**
 * Shared tail of every successful play. The win check runs before any
 * special effect, so a player who goes out on a DrawTwo wins without
 * the opponent drawing.
 */
function finishPlay(state: GameState, card: Card): ActionOutcome {
  const playerIndex = state.currentPlayerIndex;
  const events: GameEvent[] = [{ kind: "top_card", card }];

  if ((state.hands[playerIndex] ?? []).length === 0) {
    return endGame(state, { kind: "win", playerIndex }, events);
  }

  if (card.kind === "number") {
    return advanceTo(state, (playerIndex + 1) % state.hands.length, events);
  }

  const { result, drawPile, hands } = resolveSpecialCard(
    card,
    state.drawPile,
    state.hands,
    playerIndex
  );
  const resolved: GameState = { ...state, drawPile, hands };

  if (result.kind === "tie") {
    return endGame(resolved, { kind: "tie" }, events);
  }
  return advanceTo(resolved, result.nextPlayer, events);
}

/** Hands the turn to `nextPlayer` and shows them their hand. */
function advanceTo(
  state: GameState,
  nextPlayer: number,
  events: readonly GameEvent[]
): ActionOutcome {
  return {
    state: {
      ...state,
      currentPlayerIndex: nextPlayer,
      hasDrawn: false,
      turnNumber: state.turnNumber + 1,
    },
    events: [
      ...events,
      {
        kind: "hand",
        playerIndex: nextPlayer,
        cards: state.hands[nextPlayer] ?? [],
      },
    ],
  };
}

function endGame(
  state: GameState,
  outcome: GameOutcome,
  events: readonly GameEvent[]
): ActionOutcome {
  return {
    state: { ...state, status: { kind: "finished", outcome } },
    events: [...events, { kind: "game_over", outcome }],
  };
}

// ─── Helpers ───────────────────────────────────────────────────────

function rejected(
  state: GameState,
  code: GameErrorCode
): ActionOutcome {
  return {
    state,
    events: [{ kind: "error", code, message: ERROR_MESSAGES[code] }],
  };
}

/** Bumps the version and appends the action to the log. */
function logAction(
  state: GameState,
  action: GameAction
): Pick<GameState, "actionLog" | "version"> {
  const version = state.version + 1;
  return {
    version,
    actionLog: [
      ...state.actionLog,
      { action, playerIndex: state.currentPlayerIndex, version },
    ],
  };
}

function replaceHand(
  hands: readonly (readonly Card[])[],
  playerIndex: number,
  hand: readonly Card[]
): readonly (readonly Card[])[] {
  return hands.map((h, i) => (i === playerIndex ? hand : h));
}
