// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of config files and player input.
// This is the "parse boundary" — raw input enters, typed data exits.

import { z } from "zod";
import { COLORS } from "../types/card";
import {
  DEFAULT_CARDS_PER_PLAYER,
  DEFAULT_PLAYERS,
} from "../types/config";

// ─── Primitives ────────────────────────────────────────────────────

/** A palette color, matched exactly (case-sensitive). */
export const ColorSchema = z.enum(COLORS);

// ─── Config ────────────────────────────────────────────────────────

export const GameConfigSchema = z
  .object({
    players: z.number().int().min(2).max(10).default(DEFAULT_PLAYERS),
    cardsPerPlayer: z
      .number()
      .int()
      .min(1)
      .max(20)
      .default(DEFAULT_CARDS_PER_PLAYER),
  })
  .strict();

/** Inferred type from the Zod schema — should match GameConfig. */
export type ParsedGameConfig = z.infer<typeof GameConfigSchema>;

/**
 * Parses raw JSON into a validated GameConfig, filling defaults.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseGameConfig(raw: unknown): ParsedGameConfig {
  return GameConfigSchema.parse(raw);
}

/**
 * Safe parse variant — returns a discriminated result instead of throwing.
 */
export function safeParseGameConfig(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedGameConfig> {
  return GameConfigSchema.safeParse(raw);
}
