#!/usr/bin/env -S node --import tsx
// ─── color-match ───────────────────────────────────────────────────
// Terminal entry point. Exits 0 when the game ends or input runs out,
// 1 on bad arguments or an invalid config file.

import { USAGE, parseCliArgs } from "./args";
import { loadConfig } from "./config/load-config";
import { createReadlineIO } from "./session/readline-io";
import { runSession } from "./session/game-session";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    console.error(args.error);
    console.error(USAGE);
    return 1;
  }
  if (args.options.help) {
    console.log(USAGE);
    return 0;
  }

  const loaded = await loadConfig(args.options.configPath);
  if (!loaded.ok) {
    console.error(loaded.error);
    return 1;
  }

  const io = createReadlineIO(process.stdin, process.stdout);
  try {
    await runSession(io, { seed: args.options.seed, config: loaded.config });
  } finally {
    io.close();
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
