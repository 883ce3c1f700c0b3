import type { Board, GameState, Move, PlayerIndex } from "../src/types";
import { makeState } from "../src/engine/makeState";

export const NAMES = ["Ann", "Bob"] as const;

/** Board from two sides: six pits then the store, for player 0 and player 1. */
export function boardOf(
  pits0: readonly number[],
  store0: number,
  pits1: readonly number[],
  store1: number
): number[] {
  if (pits0.length !== 6 || pits1.length !== 6) throw new Error("boardOf: need 6 pits per side");
  return [...pits0, store0, ...pits1, store1];
}

export function stateWith(board: Board, currentPlayer: PlayerIndex = 0): GameState {
  return makeState({ board, currentPlayer, names: NAMES });
}

export function sow(player: PlayerIndex, pit: number): Move {
  return { kind: "sow", player, pit };
}

export function sumBoard(board: Board): number {
  return board.reduce((a, b) => a + b, 0);
}
