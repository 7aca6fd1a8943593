// ─── Game Configuration ────────────────────────────────────────────

/** Table setup read from a config file or defaults. */
export interface GameConfig {
  /** Number of seats at the table. */
  readonly players: number;
  /** Cards dealt to each player before the first turn. */
  readonly cardsPerPlayer: number;
}

/** Seats at the table when no config says otherwise. */
export const DEFAULT_PLAYERS = 2;

/** Starting hand size when no config says otherwise. */
export const DEFAULT_CARDS_PER_PLAYER = 7;
