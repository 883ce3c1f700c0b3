import type { GameState } from "../types";
import { STORES, SLOT_COUNT } from "./constants";
import { isRoundOver, roundResult } from "./gameOver";

// Read per call so the switch can be flipped without reloading the engine.
function checkpointsEnabled(): boolean {
  return process.env.MANCALA_VALIDATE_STATE !== "0";
}

/**
 * assertGameState (shape + board invariants)
 *
 * Intent:
 * - Catch structural drift (missing fields, wrong slot count, bad player index)
 * - Enforce the board invariants every transition must keep: non-negative integer slots,
 *   seed total equal to totalSeeds, phase and result consistent with the board
 *
 * Always on: this is the gate for anything parsed from outside the engine.
 */
export function assertGameState(state: unknown, where = "unknown"): asserts state is GameState {
  assert(isObject(state), "state missing", where);

  // ---------------------------
  // Core shape
  // ---------------------------

  assert(state.phase === "active" || state.phase === "ended", "phase invalid", where);

  const names = state.names;
  assert(Array.isArray(names) && names.length === 2, "names must have 2 entries", where);
  for (const n of names) assert(typeof n === "string", "name not a string", where);

  assert(state.currentPlayer === 0 || state.currentPlayer === 1, "currentPlayer invalid", where);

  assert(isNonNegativeInt(state.totalSeeds), "totalSeeds invalid", where);
  assert(isNonNegativeInt(state.moveCount), "moveCount invalid", where);

  // ---------------------------
  // Board
  // ---------------------------

  const board = state.board;
  assert(Array.isArray(board), "board not array", where);
  assert(board.length === SLOT_COUNT, `board must have ${SLOT_COUNT} slots`, where);

  let sum = 0;
  for (let i = 0; i < board.length; i++) {
    const v: unknown = board[i];
    assert(isNonNegativeInt(v), `board[${i}] invalid: ${String(v)}`, where);
    sum += v;
  }
  assert(sum === state.totalSeeds, `seed total ${sum} != totalSeeds ${String(state.totalSeeds)}`, where);

  // ---------------------------
  // Phase / result
  // ---------------------------

  const over = isRoundOver(board);
  if (state.phase === "active") {
    assert(!over, "active phase on a terminal board", where);
    assert(state.result === undefined, "active phase must not carry a result", where);
  } else {
    assert(over, "ended phase on a non-terminal board", where);
    const result = state.result;
    assert(isObject(result), "ended phase requires result", where);
    assert(result.kind === "win" || result.kind === "tie", "result.kind invalid", where);
    if (result.kind === "win") {
      assert(result.winner === 0 || result.winner === 1, "result.winner invalid", where);
    }
    const s = result.scores;
    assert(Array.isArray(s) && s.length === 2, "result.scores invalid", where);

    const expected = roundResult(board);
    const winner = expected.kind === "win" ? expected.winner : undefined;
    assert(
      result.kind === expected.kind &&
        result.winner === winner &&
        s[0] === expected.scores[0] &&
        s[1] === expected.scores[1],
      "result does not match the board",
      where
    );
  }
}

/**
 * Checkpoint run after every engine transition (makeState, applyMove).
 * MANCALA_VALIDATE_STATE=0 skips it; parsed input still goes through assertGameState.
 */
export function validateState(state: GameState, where = "unknown"): void {
  if (!checkpointsEnabled()) return;
  assertGameState(state, where);
}

/**
 * Invariants between consecutive states of one round: same seed total, and neither store
 * ever loses seeds.
 */
export function validateTransition(prev: GameState, next: GameState, where = "unknown"): void {
  if (!checkpointsEnabled()) return;

  assert(prev.totalSeeds === next.totalSeeds, "totalSeeds changed", where);
  for (const store of STORES) {
    assert(next.board[store] >= prev.board[store], `store ${store} decreased`, where);
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateState @ ${where}] ${message}`);
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isNonNegativeInt(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}
