import type { Board, GameState, PlayerIndex } from "../types";
import { DEFAULT_SEEDS_PER_PIT, PITS_PER_SIDE } from "./constants";
import { isRoundOver, roundResult } from "./gameOver";
import { validateState } from "./validateState";

export type MakeStateOptions = {
  names?: readonly [string, string];
  seedsPerPit?: number;

  /**
   * Start from an arbitrary position instead of the canonical layout (setups, puzzles,
   * tests). `totalSeeds` is taken from this board.
   */
  board?: Board;
  currentPlayer?: PlayerIndex;
};

export function initialBoard(seedsPerPit: number = DEFAULT_SEEDS_PER_PIT): Board {
  const side = [...Array<number>(PITS_PER_SIDE).fill(seedsPerPit), 0];
  return [...side, ...side];
}

/**
 * Start a round:
 * - board: [n,n,n,n,n,n,0] per side unless a board is supplied
 * - currentPlayer: 0
 * - phase: "active", or "ended" (with result) if the supplied board is already terminal
 */
export function makeState(opts: MakeStateOptions = {}): GameState {
  const board = opts.board ? [...opts.board] : initialBoard(opts.seedsPerPit);
  const over = isRoundOver(board);

  const state: GameState = {
    phase: over ? "ended" : "active",
    names: opts.names ?? ["Player 1", "Player 2"],
    board,
    currentPlayer: opts.currentPlayer ?? 0,
    totalSeeds: board.reduce((a, b) => a + b, 0),
    moveCount: 0,
    ...(over ? { result: roundResult(board) } : {}),
  };

  validateState(state, "makeState");
  return state;
}
