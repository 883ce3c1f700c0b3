import type { GameState, Move } from "../types";
import { isValidSlotIndex } from "./boardMapping";
import { applyMoveWithSync } from "./sync";
import type { MoveResponse } from "./moveResponse";
import { validateMove } from "./validateMove";

/**
 * Validate a proposed move and return a response envelope.
 *
 * Validation is complete before anything is applied: on { ok: false } the caller's state is
 * untouched and the same player may simply try again.
 *
 * Order of checks:
 * - round still active (GAME_ENDED)
 * - well-formed move: player 0/1, pit an integer slot index (INVALID_INPUT)
 * - move belongs to the current player (WRONG_ACTOR)
 * - rule checks from validateMove (STORE_NOT_SELECTABLE, NOT_YOUR_PIT, EMPTY_PIT)
 */
export function tryApplyMoveWithResponse(state: GameState, move: Move): MoveResponse {
  if (state.phase === "ended") {
    return {
      ok: false,
      error: { code: "GAME_ENDED", message: "The round is over." },
    };
  }

  if ((move.player !== 0 && move.player !== 1) || !isValidSlotIndex(move.pit)) {
    return {
      ok: false,
      error: {
        code: "INVALID_INPUT",
        message: "Move requires player 0 or 1 and a pit index 0..13.",
      },
    };
  }

  if (move.player !== state.currentPlayer) {
    return {
      ok: false,
      error: { code: "WRONG_ACTOR", message: "It is not that player's turn." },
    };
  }

  const check = validateMove(state, move.pit, move.player);
  if (!check.ok) return { ok: false, error: check.error };

  const result = applyMoveWithSync(state, move);

  return {
    ok: true,
    result,
    turn: {
      nextPlayer: result.nextState.currentPlayer,
      extraTurn: result.effect.extraTurn,
      roundOver: result.nextState.phase === "ended",
    },
  };
}
