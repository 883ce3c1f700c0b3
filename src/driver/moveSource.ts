import type { GameState, PlayerIndex } from "../types";

/** A player's answer when asked for a move. Quitting ends the round, not the process. */
export type TurnChoice = { kind: "move"; pit: number } | { kind: "quit" };

/**
 * Where a player's moves come from: a terminal prompt, a script, a test.
 * The round driver depends only on this interface.
 */
export interface MoveSource {
  getMove(state: GameState, player: PlayerIndex): TurnChoice | Promise<TurnChoice>;
}

/**
 * Plays the given pits in order, then quits. Used for tests, demos and re-running a
 * recorded sequence.
 */
export function scriptedMoveSource(pits: readonly number[]): MoveSource {
  let next = 0;
  return {
    getMove(): TurnChoice {
      if (next >= pits.length) return { kind: "quit" };
      const pit = pits[next];
      next += 1;
      return { kind: "move", pit };
    },
  };
}
