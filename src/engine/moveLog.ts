// src/engine/moveLog.ts
//
// The record of one round: every applied sow with the state hash on either side of it.
// playRound returns it; reapplyMoveLog checks it against the rules from the starting position.

import type { GameState, Move, MoveEffect } from "../types";
import { hashState } from "./stateHash";
import { tryApplyMoveWithResponse } from "./tryApply";

export type MoveLogEntry = {
  beforeHash: string;
  move: Move;
  afterHash: string;
};

export type MoveLog = readonly MoveLogEntry[];

export type LoggedMove = {
  nextState: GameState;
  effect: MoveEffect;
  nextLog: MoveLog;
};

/**
 * Validate and apply a sow, appending its entry to `log`. Throws with the engine's error
 * code when the move is rejected; neither `state` nor `log` is mutated.
 */
export function applyAndLog(state: GameState, move: Move, log: MoveLog): LoggedMove {
  const res = tryApplyMoveWithResponse(state, move);
  if (!res.ok) {
    throw new Error(`applyAndLog: ${res.error.code} (${res.error.message})`);
  }

  const { nextState, effect, logEntry } = res.result;
  return { nextState, effect, nextLog: [...log, logEntry] };
}

/**
 * Replay every sow of `log` from `initial` through the same checks a live round uses.
 * Returns the final state; throws at the first entry whose hashes or move do not hold.
 */
export function reapplyMoveLog(initial: GameState, log: MoveLog): GameState {
  let state = initial;

  log.forEach((entry, i) => {
    if (hashState(state) !== entry.beforeHash) {
      throw new Error(`Move log[${i}] beforeHash mismatch`);
    }

    const res = tryApplyMoveWithResponse(state, entry.move);
    if (!res.ok) {
      throw new Error(`Move log[${i}] rejected: ${res.error.code}`);
    }

    if (res.result.afterHash !== entry.afterHash) {
      throw new Error(`Move log[${i}] afterHash mismatch`);
    }
    state = res.result.nextState;
  });

  return state;
}
