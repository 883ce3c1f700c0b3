// src/ui/prompts.ts
//
// Translates typed answers into engine terms. Pure string handling; the terminal
// plumbing lives in src/cli.

import { PIT_LABELS } from "../engine/constants";

export type PitSelection =
  | { kind: "move"; pit: number }
  | { kind: "quit" }
  | { kind: "invalid"; message: string };

export function pitPrompt(name: string): string {
  return `${name}, select one of your pits that is not empty (or enter q to quit): `;
}

export const PLAY_AGAIN_PROMPT = "Would you like to play again (y/n)? ";

/**
 * "q" quits; a single pit letter maps to its slot index. Ownership and emptiness are
 * left to the engine's validateMove.
 */
export function parsePitSelection(input: string): PitSelection {
  const s = input.trim().toLowerCase();
  if (s === "q") return { kind: "quit" };

  if (s.length !== 1 || !/^[a-z]$/.test(s)) {
    return { kind: "invalid", message: "Please enter a single letter." };
  }

  const pit = PIT_LABELS.indexOf(s);
  if (pit === -1) {
    return {
      kind: "invalid",
      message: "Please enter a letter corresponding to one of your non-empty pits.",
    };
  }

  return { kind: "move", pit };
}

export type PlayAgainAnswer = { kind: "answer"; again: boolean } | { kind: "invalid"; message: string };

/** Only the first character counts: "yes please" is a yes. */
export function parsePlayAgain(input: string): PlayAgainAnswer {
  const c = input.trim().toLowerCase().charAt(0);
  if (c === "y") return { kind: "answer", again: true };
  if (c === "n") return { kind: "answer", again: false };
  return { kind: "invalid", message: "Please type 'y' or 'n'." };
}

