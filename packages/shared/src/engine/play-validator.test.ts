import { describe, it, expect } from "vitest";
import { isValidPlay, validateAction } from "./play-validator";
import {
  actionCard,
  makeState,
  numberCard,
  wildCard,
} from "../__tests__/fixtures";

// ══════════════════════════════════════════════════════════════════════
// isValidPlay — each condition on its own
// ══════════════════════════════════════════════════════════════════════

describe("isValidPlay", () => {
  // ── wilds ────────────────────────────────────────────────────────

  describe("wild cards", () => {
    it("accepts Wild on anything", () => {
      expect(isValidPlay(wildCard("Wild"), numberCard("Red", 3), "Red")).toBe(true);
      expect(isValidPlay(wildCard("Wild"), actionCard("Blue", "Skip"), "Blue")).toBe(true);
    });

    it("accepts WildDrawFour on anything", () => {
      expect(isValidPlay(wildCard("WildDrawFour"), numberCard("Green", 1), "Green")).toBe(true);
      expect(
        isValidPlay(wildCard("WildDrawFour"), wildCard("Wild", "Yellow"), "Yellow")
      ).toBe(true);
    });
  });

  // ── color ────────────────────────────────────────────────────────

  describe("color match", () => {
    it("accepts a numbered card of the active color", () => {
      expect(isValidPlay(numberCard("Red", 2), numberCard("Red", 9), "Red")).toBe(true);
    });

    it("accepts a colored special of the active color", () => {
      expect(isValidPlay(actionCard("Red", "DrawTwo"), numberCard("Red", 9), "Red")).toBe(true);
    });

    it("uses the active color, not the top card's printed color", () => {
      const top = wildCard("Wild", "Blue");
      expect(isValidPlay(numberCard("Blue", 4), top, "Blue")).toBe(true);
      expect(isValidPlay(numberCard("Red", 4), numberCard("Red", 5), "Blue")).toBe(false);
    });
  });

  // ── number ───────────────────────────────────────────────────────

  describe("number match", () => {
    it("accepts the same digit in a different color", () => {
      expect(isValidPlay(numberCard("Green", 5), numberCard("Red", 5), "Red")).toBe(true);
    });

    it("rejects different digits in different colors", () => {
      expect(isValidPlay(numberCard("Green", 5), numberCard("Red", 6), "Red")).toBe(false);
    });

    it("never matches two non-numbered cards by number", () => {
      expect(
        isValidPlay(actionCard("Green", "Skip"), actionCard("Red", "DrawTwo"), "Red")
      ).toBe(false);
    });
  });

  // ── special ──────────────────────────────────────────────────────

  describe("special match", () => {
    it("accepts Skip on Skip across colors", () => {
      expect(isValidPlay(actionCard("Green", "Skip"), actionCard("Red", "Skip"), "Red")).toBe(true);
    });

    it("accepts DrawTwo on DrawTwo across colors", () => {
      expect(
        isValidPlay(actionCard("Yellow", "DrawTwo"), actionCard("Blue", "DrawTwo"), "Blue")
      ).toBe(true);
    });

    it("rejects a colored special on a numbered card of another color", () => {
      expect(isValidPlay(actionCard("Green", "Skip"), numberCard("Red", 1), "Red")).toBe(false);
    });

    it("rejects a colored special on a wild of another color", () => {
      expect(isValidPlay(actionCard("Green", "Skip"), wildCard("Wild", "Red"), "Red")).toBe(false);
    });
  });

  it("rejects a numbered card on a colored wild of another color", () => {
    expect(isValidPlay(numberCard("Green", 5), wildCard("Wild", "Red"), "Red")).toBe(false);
  });
});

// ══════════════════════════════════════════════════════════════════════
// validateAction
// ══════════════════════════════════════════════════════════════════════

describe("validateAction", () => {
  it("allows any card in hand when the discard pile is empty", () => {
    const state = makeState({
      hands: [[actionCard("Green", "Skip")], []],
    });
    expect(validateAction(state, { kind: "play", cardName: "GreenSkip" })).toEqual({
      valid: true,
    });
  });

  it("rejects cards that are not in the current hand", () => {
    const state = makeState({
      hands: [[numberCard("Red", 1)], [numberCard("Blue", 2)]],
    });
    expect(validateAction(state, { kind: "play", cardName: "Blue2" })).toEqual({
      valid: false,
      code: "card_not_in_hand",
      reason: "That card is not in your hand.",
    });
  });

  it("rejects cards that do not match the discard pile", () => {
    const state = makeState({
      hands: [[numberCard("Blue", 2)], []],
      discardPile: [numberCard("Red", 9)],
      currentColor: "Red",
    });
    expect(validateAction(state, { kind: "play", cardName: "Blue2" })).toEqual({
      valid: false,
      code: "card_not_playable",
      reason: "That card didn't match in number or color.",
    });
  });

  it("rejects a second draw in the same turn", () => {
    const state = makeState({ hasDrawn: true });
    expect(validateAction(state, { kind: "draw" })).toMatchObject({
      valid: false,
      code: "already_drawn",
    });
  });

  it("allows drawing from an empty pile", () => {
    expect(validateAction(makeState(), { kind: "draw" })).toEqual({ valid: true });
  });

  it("rejects passing before drawing", () => {
    expect(validateAction(makeState(), { kind: "pass" })).toMatchObject({
      valid: false,
      code: "must_draw_first",
    });
  });

  it("allows passing after drawing", () => {
    expect(validateAction(makeState({ hasDrawn: true }), { kind: "pass" })).toEqual({
      valid: true,
    });
  });

  it("rejects choosing a color when no wild is waiting", () => {
    expect(
      validateAction(makeState(), { kind: "choose_color", color: "Red" })
    ).toMatchObject({ valid: false, code: "not_awaiting_color" });
  });

  it("only allows choosing a color while a wild is waiting", () => {
    const state = makeState({ status: { kind: "awaiting_color", playerIndex: 0 } });
    expect(validateAction(state, { kind: "choose_color", color: "Green" })).toEqual({
      valid: true,
    });
    expect(validateAction(state, { kind: "draw" })).toMatchObject({
      valid: false,
      code: "awaiting_color",
    });
  });

  it("rejects everything once the game is over", () => {
    const state = makeState({
      status: { kind: "finished", outcome: { kind: "tie" } },
      hasDrawn: true,
    });
    for (const action of [
      { kind: "draw" },
      { kind: "pass" },
      { kind: "play", cardName: "Red1" },
      { kind: "choose_color", color: "Red" },
    ] as const) {
      expect(validateAction(state, action)).toMatchObject({
        valid: false,
        code: "game_over",
      });
    }
  });
});
