import type { GameState, Move, MoveEffect } from "../types";
import { applyMove } from "./applyMove";
import { hashState } from "./stateHash";
import type { MoveLogEntry } from "./moveLog";

export type SyncResult = {
  nextState: GameState;
  effect: MoveEffect;
  afterHash: string;
  logEntry: MoveLogEntry;
};

/**
 * Apply a move and return what a caller needs to keep in step:
 * - nextState (authoritative)
 * - effect (sowing path, capture, extra turn) for renderers
 * - afterHash + logEntry for the round's move log
 */
export function applyMoveWithSync(state: GameState, move: Move): SyncResult {
  const beforeHash = hashState(state);
  const { state: nextState, effect } = applyMove(state, move);
  const afterHash = hashState(nextState);

  return { nextState, effect, afterHash, logEntry: { beforeHash, move, afterHash } };
}
