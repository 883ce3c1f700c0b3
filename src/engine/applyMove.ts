// src/engine/applyMove.ts
//
// Applies a validated sow Move to GameState:
// distribute -> capture check -> turn pointer -> terminal check.
//
// IMPORTANT: applyMove assumes the move is legal (see validateMove / tryApplyMoveWithResponse).
// It never mutates its input state.

import type { GameState, Move, MoveEffect } from "../types";
import { opponentOf, storeIndex } from "./boardMapping";
import { checkCapture } from "./capture";
import { distributeSeeds } from "./distribute";
import { isRoundOver, roundResult } from "./gameOver";
import { validateState, validateTransition } from "./validateState";

export type ApplyMoveResult = {
  state: GameState;
  effect: MoveEffect;
};

export function applyMove(state: GameState, move: Move): ApplyMoveResult {
  const { player, pit } = move;

  const sown = distributeSeeds(state.board, pit, player);
  const { board, capture } = checkCapture(sown.board, sown.lastIndex, player);

  // Last seed in the mover's own store: same player goes again.
  const extraTurn = sown.lastIndex === storeIndex(player);
  const over = isRoundOver(board);

  const next: GameState = {
    phase: over ? "ended" : "active",
    names: state.names,
    board,
    currentPlayer: extraTurn ? player : opponentOf(player),
    totalSeeds: state.totalSeeds,
    moveCount: state.moveCount + 1,
    ...(over ? { result: roundResult(board) } : {}),
  };

  validateState(next, "applyMove");
  validateTransition(state, next, "applyMove");

  const effect: MoveEffect = {
    move,
    path: sown.path,
    lastIndex: sown.lastIndex,
    extraTurn,
    ...(capture ? { capture } : {}),
  };

  return { state: next, effect };
}
