// src/engine/legalMoves.ts

import type { GameState, Move, PlayerIndex } from "../types";
import { pitIndexesOf } from "./boardMapping";
import { validateMove } from "./validateMove";

/** Pits `player` may sow from, ascending. Empty once the round has ended. */
export function legalPits(state: GameState, player: PlayerIndex): number[] {
  if (state.phase === "ended") return [];
  return pitIndexesOf(player).filter((pit) => validateMove(state, pit, player).ok);
}

export function listLegalMoves(state: GameState, player: PlayerIndex): Move[] {
  return legalPits(state, player).map((pit): Move => ({ kind: "sow", player, pit }));
}
