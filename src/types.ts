// src/types.ts

export type PlayerIndex = 0 | 1;

/**
 * 14 slots, counter-clockwise from player 0's first pit:
 * 0..5 = player 0 pits, 6 = player 0 store, 7..12 = player 1 pits, 13 = player 1 store.
 */
export type Board = readonly number[];

export type Move = {
  kind: "sow";
  player: PlayerIndex;
  pit: number;
};

export interface Capture {
  player: PlayerIndex;

  // The own pit the last seed landed in (held exactly 1 seed).
  pit: number;
  oppositePit: number;

  // Seeds moved into the store: opposite pit contents + the landing seed.
  seeds: number;
}

/** What a single applied move did, beyond the resulting board. */
export interface MoveEffect {
  move: Move;

  // Receiving slot of every sown seed, in sown order.
  path: readonly number[];
  lastIndex: number;
  capture?: Capture;
  extraTurn: boolean;
}

export type Scores = readonly [number, number];

export type RoundResult =
  | { kind: "win"; winner: PlayerIndex; scores: Scores }
  | { kind: "tie"; scores: Scores };

export interface GameState {
  phase: "active" | "ended";
  names: readonly [string, string];
  board: Board;
  currentPlayer: PlayerIndex;

  // Fixed at round creation; every later board must sum to this.
  totalSeeds: number;
  moveCount: number;

  // Set when the round ends
  result?: RoundResult;
}
