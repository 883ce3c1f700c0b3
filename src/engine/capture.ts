// src/engine/capture.ts

import type { Board, Capture, PlayerIndex } from "../types";
import { isOwnPit, oppositePitIndex, storeIndex } from "./boardMapping";

export type CaptureCheck = {
  board: Board;
  capture?: Capture;
};

/**
 * Single-seed capture: if the last seed landed in one of the mover's own (previously empty)
 * pits, that seed and everything in the opposite pit go to the mover's store.
 *
 * No-op (same board, no capture) otherwise, including landings in a store, in an opponent
 * pit, or in a pit that already held seeds.
 */
export function checkCapture(board: Board, lastIndex: number, player: PlayerIndex): CaptureCheck {
  if (!isOwnPit(lastIndex, player)) return { board };
  if (board[lastIndex] !== 1) return { board };

  const opposite = oppositePitIndex(lastIndex);
  const store = storeIndex(player);
  const seeds = board[opposite] + board[lastIndex];

  const next = [...board];
  next[store] += seeds;
  next[opposite] = 0;
  next[lastIndex] = 0;

  return {
    board: next,
    capture: { player, pit: lastIndex, oppositePit: opposite, seeds },
  };
}
