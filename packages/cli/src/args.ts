// ─── CLI Arguments ─────────────────────────────────────────────────
// Parses `--seed <string>` and `--config <file.json>` from argv.

export interface CliOptions {
  /** Skips the seed prompt when set. */
  readonly seed?: string;
  readonly configPath?: string;
  readonly help: boolean;
}

export type ParseArgsResult =
  | { readonly ok: true; readonly options: CliOptions }
  | { readonly ok: false; readonly error: string };

export const USAGE = `
Usage: color-match [--seed <string>] [--config <file.json>]

Options:
  --seed <string>       Seed for the shuffle (prompted for when omitted)
  --config <file.json>  Player count and hand size, e.g. { "players": 3 }
  -h, --help            Show this message
`;

/**
 * Reads options from `args` (argv without the node and script entries).
 * Each option may appear once; a value is always the following argument.
 */
export function parseCliArgs(args: readonly string[]): ParseArgsResult {
  let seed: string | undefined;
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    if (arg === "--seed" || arg === "--config") {
      const value = args[i + 1];
      if (value === undefined) {
        return { ok: false, error: `Missing value for ${arg}` };
      }
      if (arg === "--seed") {
        seed = value;
      } else {
        configPath = value;
      }
      i++;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg ?? ""}` };
  }

  return { ok: true, options: { seed, configPath, help } };
}
