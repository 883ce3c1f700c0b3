// src/cli/config.ts
//
// CLI configuration: two positional player names plus environment knobs.
//
// Env:
//   MANCALA_SOW_DELAY_MS=300   pause after each redrawn frame
//   MANCALA_ANIMATE=true       redraw after every sown seed
//   MANCALA_SEEDS_PER_PIT=4    initial seeds per pit (1..12)

import { DEFAULT_SEEDS_PER_PIT } from "../engine/constants";

export type Env = Readonly<Record<string, string | undefined>>;

export type CliConfig = {
  names: readonly [string, string];
  sowDelayMs: number;
  animate: boolean;
  seedsPerPit: number;
};

export type ConfigResult = { ok: true; config: CliConfig } | { ok: false; message: string };

export const USAGE = "Usage: mancala <name0> <name1>";

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

/** `argv` excludes the node binary and script path (process.argv.slice(2)). */
export function loadConfig(argv: readonly string[], env: Env): ConfigResult {
  const names = argv.filter((a) => !a.startsWith("-"));
  if (names.length !== 2) {
    return { ok: false, message: USAGE };
  }

  const [name0, name1] = names;
  if (!name0.trim() || !name1.trim()) {
    return { ok: false, message: USAGE };
  }

  const seedsPerPit = envInt(env, "MANCALA_SEEDS_PER_PIT", DEFAULT_SEEDS_PER_PIT);
  if (seedsPerPit < 1 || seedsPerPit > 12) {
    return { ok: false, message: "MANCALA_SEEDS_PER_PIT must be an integer 1..12." };
  }

  return {
    ok: true,
    config: {
      names: [name0, name1],
      sowDelayMs: Math.max(0, envInt(env, "MANCALA_SOW_DELAY_MS", 300)),
      animate: envFlag(env, "MANCALA_ANIMATE", true),
      seedsPerPit,
    },
  };
}
