// src/engine/gameOver.ts

import type { Board, PlayerIndex, RoundResult, Scores } from "../types";
import { firstPitIndex, sumPits } from "./boardMapping";
import { SLOTS_PER_SIDE } from "./constants";

/**
 * A round is over when either side's six pits are all empty.
 * Stores are not counted, and the other side may still hold seeds.
 */
export function isRoundOver(board: Board): boolean {
  return sumPits(board, 0) === 0 || sumPits(board, 1) === 0;
}

/** Six pits + store. Seeds left in pits count for the side they sit on (no end sweep). */
export function score(board: Board, player: PlayerIndex): number {
  const first = firstPitIndex(player);
  let total = 0;
  for (let i = first; i < first + SLOTS_PER_SIDE; i++) total += board[i];
  return total;
}

export function scores(board: Board): Scores {
  return [score(board, 0), score(board, 1)];
}

/**
 * Winner is the strictly higher score; equal scores tie.
 * Pure over the board: callers decide whether the round is actually over.
 */
export function roundResult(board: Board): RoundResult {
  const s = scores(board);
  if (s[0] === s[1]) return { kind: "tie", scores: s };
  return { kind: "win", winner: s[0] > s[1] ? 0 : 1, scores: s };
}
