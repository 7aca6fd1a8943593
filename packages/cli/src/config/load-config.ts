// ─── Config Loader ─────────────────────────────────────────────────
// Reads a game config JSON file and validates it with the schema.
// A missing path yields the defaults.

import { readFile } from "node:fs/promises";
import { safeParseGameConfig } from "@color-match/schema";
import type { GameConfig } from "@color-match/shared";

import { formatZodIssues } from "./format-zod-issues";

/** Result of a config load attempt. Discriminated union. */
export type LoadConfigResult =
  | { readonly ok: true; readonly config: GameConfig }
  | { readonly ok: false; readonly error: string };

/**
 * Parses `raw` (already-decoded JSON) into a GameConfig, filling
 * defaults for omitted fields.
 */
export function resolveConfig(raw: unknown): LoadConfigResult {
  const result = safeParseGameConfig(raw);

  if (!result.success) {
    return { ok: false, error: formatZodIssues(result.error.issues) };
  }

  return { ok: true, config: result.data };
}

/**
 * Loads the config at `filePath`, or the defaults when no path is given.
 */
export async function loadConfig(
  filePath: string | undefined
): Promise<LoadConfigResult> {
  if (filePath === undefined) {
    return resolveConfig({});
  }

  // ── Read file contents ───────────────────────────────────────────
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Failed to read config: ${message}` };
  }

  // ── Parse JSON ───────────────────────────────────────────────────
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: `Config file is not valid JSON: ${filePath}` };
  }

  return resolveConfig(json);
}
