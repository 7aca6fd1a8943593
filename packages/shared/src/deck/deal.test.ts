import { describe, it, expect } from "vitest";
import { dealCards, drawFromFront } from "./deal";
import { createDeck } from "./presets";
import { formatHand } from "./card-names";

describe("dealCards", () => {
  it("deals seven cards each to two players by default", () => {
    const { deck, hands } = dealCards(createDeck());
    expect(hands).toHaveLength(2);
    expect(hands[0]).toHaveLength(7);
    expect(hands[1]).toHaveLength(7);
    expect(deck).toHaveLength(90);
  });

  it("deals round-robin from the front", () => {
    const { hands } = dealCards(createDeck());
    expect(formatHand(hands[0]!)).toBe("Red0 Blue0 Red1 Blue1 Red2 Blue2 Red3");
    expect(formatHand(hands[1]!)).toBe("Green0 Yellow0 Green1 Yellow1 Green2 Yellow2 Green3");
  });

  it("leaves the remaining deck starting after the last dealt card", () => {
    const full = createDeck();
    const { deck } = dealCards(full);
    expect(deck[0]).toBe(full[14]);
  });

  it("supports other table sizes", () => {
    const { deck, hands } = dealCards(createDeck(), 4, 3);
    expect(hands.map((h) => h.length)).toEqual([3, 3, 3, 3]);
    expect(deck).toHaveLength(92);
    expect(formatHand(hands[3]!)).toBe("Yellow0 Yellow1 Yellow2");
  });

  it("leaves shorter hands when the deck runs out mid-deal", () => {
    const short = createDeck().slice(0, 3);
    const { deck, hands } = dealCards(short, 2, 2);
    expect(formatHand(hands[0]!)).toBe("Red0 Blue0");
    expect(formatHand(hands[1]!)).toBe("Green0");
    expect(deck).toEqual([]);
  });

  it("deals nothing from an empty deck", () => {
    const { deck, hands } = dealCards([], 2, 7);
    expect(hands).toEqual([[], []]);
    expect(deck).toEqual([]);
  });

  it("does not mutate the input deck", () => {
    const full = createDeck();
    dealCards(full);
    expect(full).toHaveLength(104);
  });
});

describe("drawFromFront", () => {
  it("takes cards from the front", () => {
    const pile = createDeck().slice(0, 5);
    const { drawn, remaining } = drawFromFront(pile, 2);
    expect(drawn).toEqual(pile.slice(0, 2));
    expect(remaining).toEqual(pile.slice(2));
  });

  it("returns fewer cards when the pile is short", () => {
    const pile = createDeck().slice(0, 1);
    const { drawn, remaining } = drawFromFront(pile, 4);
    expect(drawn).toHaveLength(1);
    expect(remaining).toEqual([]);
  });
});
