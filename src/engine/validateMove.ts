// src/engine/validateMove.ts

import type { GameState, PlayerIndex } from "../types";
import { isOwnSlot, isStore } from "./boardMapping";
import type { EngineError } from "./moveResponse";

export type MoveValidation = { ok: true } | { ok: false; error: EngineError };

export const STORE_NOT_SELECTABLE: EngineError = {
  code: "STORE_NOT_SELECTABLE",
  message: "Sorry, you can't select the store.",
};

export const NOT_YOUR_PIT: EngineError = {
  code: "NOT_YOUR_PIT",
  message: "Sorry, you don't control that pit.",
};

export const EMPTY_PIT: EngineError = {
  code: "EMPTY_PIT",
  message: "Sorry, that pit is empty.",
};

/**
 * Can `player` sow from `pit`? Pure query; never mutates `state`.
 *
 * Precondition: `pit` is an integer slot index 0..13. Raw user input must be translated
 * (and range-checked) before it gets here.
 */
export function validateMove(state: GameState, pit: number, player: PlayerIndex): MoveValidation {
  if (isStore(pit)) return { ok: false, error: STORE_NOT_SELECTABLE };
  if (!isOwnSlot(pit, player)) return { ok: false, error: NOT_YOUR_PIT };
  if (state.board[pit] === 0) return { ok: false, error: EMPTY_PIT };
  return { ok: true };
}
