// src/engine/distribute.ts

import type { Board, PlayerIndex } from "../types";
import { opponentOf, storeIndex } from "./boardMapping";
import { normalizeSlotIndex } from "./constants";

export type Distribution = {
  board: Board;

  // Slot that received the final seed.
  lastIndex: number;

  // Receiving slot of each seed, in sown order.
  path: readonly number[];
};

/**
 * Pick up every seed in `pit` and sow them one per slot counter-clockwise.
 *
 * The opponent's store is stepped over: it receives nothing and does not use up a seed,
 * so the path simply continues one slot further.
 *
 * Precondition: `pit` holds at least one seed (validateMove guarantees this).
 */
export function distributeSeeds(board: Board, pit: number, player: PlayerIndex): Distribution {
  const seeds = board[pit];
  if (!(seeds > 0)) {
    throw new Error(`distributeSeeds: pit ${pit} is empty`);
  }

  const skip = storeIndex(opponentOf(player));
  const next = [...board];
  next[pit] = 0;

  const path: number[] = [];
  let idx = pit;
  for (let sown = 0; sown < seeds; sown++) {
    idx = normalizeSlotIndex(idx + 1);
    if (idx === skip) idx = normalizeSlotIndex(idx + 1);
    next[idx] += 1;
    path.push(idx);
  }

  return { board: next, lastIndex: idx, path };
}

/**
 * Intermediate boards for animating a sowing: the board right after pickup, then one board
 * per placed seed. The last frame equals the distributed board.
 */
export function sowingFrames(before: Board, pit: number, path: readonly number[]): Board[] {
  const frames: Board[] = [];
  const cur = [...before];
  cur[pit] = 0;
  frames.push([...cur]);

  for (const idx of path) {
    cur[idx] += 1;
    frames.push([...cur]);
  }

  return frames;
}
