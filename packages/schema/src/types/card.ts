// ─── Card Primitives ───────────────────────────────────────────────
// Foundational types for representing colors, specials, and cards.
// Uses literal types and discriminated unions to make illegal states
// unrepresentable at the type level: a numbered card can never carry
// a special, and a colored special always carries a color.

/** All palette colors, in deck-building order. */
export const COLORS = ["Red", "Green", "Blue", "Yellow"] as const;

/** The fixed four-color palette. */
export type Color = (typeof COLORS)[number];

/** Digits printed on numbered cards. */
export type CardNumber = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/** All card digits in ascending order. */
export const CARD_NUMBERS: readonly CardNumber[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

/** Specials that are printed in one of the palette colors. */
export type ColoredSpecial = "Skip" | "DrawTwo";

/** Specials that are colorless until played. */
export type WildSpecial = "Wild" | "WildDrawFour";

export const COLORED_SPECIALS: readonly ColoredSpecial[] = ["Skip", "DrawTwo"];
export const WILD_SPECIALS: readonly WildSpecial[] = ["Wild", "WildDrawFour"];

/** Every special a card can carry. */
export type Special = ColoredSpecial | WildSpecial;

/** A card's special, with `"none"` for numbered cards. */
export type SpecialKind = "none" | Special;

// ─── Card ──────────────────────────────────────────────────────────

/** A colored card showing a digit. */
export interface NumberCard {
  readonly kind: "number";
  readonly id: string;
  readonly color: Color;
  readonly number: CardNumber;
}

/** A colored Skip or DrawTwo. */
export interface ActionCard {
  readonly kind: "action";
  readonly id: string;
  readonly color: Color;
  readonly special: ColoredSpecial;
}

/**
 * A Wild or WildDrawFour. `color` is null while the card sits in the
 * deck or a hand and holds the chosen color once it has been played.
 */
export interface WildCard {
  readonly kind: "wild";
  readonly id: string;
  readonly color: Color | null;
  readonly special: WildSpecial;
}

/**
 * A card instance in play. Each physical card gets a unique ID so we
 * can track it across zones without ambiguity, even though the deck
 * holds duplicate names.
 */
export type Card = NumberCard | ActionCard | WildCard;

/** Cards that route through the special-effect resolver. */
export type SpecialCard = ActionCard | WildCard;
