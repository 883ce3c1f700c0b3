import type { GameState } from "../types";
import { assertGameState } from "./validateState";

/** JSON with a fixed key order, independent of how the state object was built. */
export function serializeState(state: GameState): string {
  return JSON.stringify({
    phase: state.phase,
    names: state.names,
    board: state.board,
    currentPlayer: state.currentPlayer,
    totalSeeds: state.totalSeeds,
    moveCount: state.moveCount,
    result: state.result,
  });
}

export function deserializeState(json: string): GameState {
  const parsed: unknown = JSON.parse(json);
  assertGameState(parsed, "deserializeState");
  return parsed;
}
