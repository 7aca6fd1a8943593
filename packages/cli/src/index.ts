// ─── @color-match/cli ──────────────────────────────────────────────
// Terminal front end for the engine. The binary lives in main.ts.

export { parseCliArgs, USAGE } from "./args";
export type { CliOptions, ParseArgsResult } from "./args";
export { loadConfig, resolveConfig } from "./config/load-config";
export type { LoadConfigResult } from "./config/load-config";
export { formatZodIssues } from "./config/format-zod-issues";
export { runSession } from "./session/game-session";
export type {
  SessionIO,
  SessionOptions,
  SessionResult,
} from "./session/game-session";
export { createReadlineIO } from "./session/readline-io";
export type { ReadlineIO } from "./session/readline-io";
