#!/usr/bin/env node
// src/cli/main.ts
//
// Usage:
//   mancala <name0> <name1>
//
// Pits are chosen by letter: a..f for the first player, g..l for the second; q quits.

import { makeState } from "../engine/makeState";
import { playRound } from "../driver/roundDriver";
import { PLAY_AGAIN_PROMPT, parsePlayAgain } from "../ui/prompts";
import { loadConfig } from "./config";
import { LineTerminal, type Terminal } from "./lineTerminal";
import { terminalMoveSource } from "./terminalMoveSource";
import { terminalObserver } from "./terminalObserver";

async function askPlayAgain(term: Terminal): Promise<boolean> {
  term.print();
  for (;;) {
    const answer = await term.ask(PLAY_AGAIN_PROMPT);
    if (answer === null) return false;

    const parsed = parsePlayAgain(answer);
    if (parsed.kind === "answer") return parsed.again;
    term.print(parsed.message);
  }
}

async function main(): Promise<number> {
  const loaded = loadConfig(process.argv.slice(2), process.env);
  if (!loaded.ok) {
    console.error(loaded.message);
    return 2;
  }
  const { config } = loaded;

  const term = new LineTerminal();
  const source = terminalMoveSource(term);
  const observer = terminalObserver(term, { animate: config.animate, sowDelayMs: config.sowDelayMs });

  try {
    for (;;) {
      const outcome = await playRound({
        sources: [source, source],
        state: makeState({ names: config.names, seedsPerPit: config.seedsPerPit }),
        observer,
      });

      if (outcome.kind === "quit") break;
      if (!(await askPlayAgain(term))) break;
    }

    term.print("Thanks for playing!");
  } finally {
    term.close();
  }

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
