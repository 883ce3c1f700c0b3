// src/engine/boardMapping.ts
//
// Positional ownership. Nothing here reads a stored owner: slot p belongs to player i
// iff i*7 <= p <= i*7+6, which includes the player's own store.

import type { Board, PlayerIndex } from "../types";
import { PITS_PER_SIDE, SLOT_COUNT, SLOTS_PER_SIDE, STORES } from "./constants";

export function firstPitIndex(player: PlayerIndex): number {
  return player * SLOTS_PER_SIDE;
}

export function storeIndex(player: PlayerIndex): number {
  return STORES[player];
}

export function opponentOf(player: PlayerIndex): PlayerIndex {
  return player === 0 ? 1 : 0;
}

export function isStore(index: number): boolean {
  return index === STORES[0] || index === STORES[1];
}

export function isValidSlotIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < SLOT_COUNT;
}

/** True if `index` is on `player`'s side (own pits or own store). */
export function isOwnSlot(index: number, player: PlayerIndex): boolean {
  const first = firstPitIndex(player);
  return first <= index && index <= first + PITS_PER_SIDE;
}

/** True if `index` is one of `player`'s six pits. */
export function isOwnPit(index: number, player: PlayerIndex): boolean {
  return isOwnSlot(index, player) && index !== storeIndex(player);
}

/** The pit directly across the board. Only meaningful for pit indexes. */
export function oppositePitIndex(pit: number): number {
  return 12 - pit;
}

export function pitIndexesOf(player: PlayerIndex): readonly number[] {
  const first = firstPitIndex(player);
  return Array.from({ length: PITS_PER_SIDE }, (_, i) => first + i);
}

export function sumPits(board: Board, player: PlayerIndex): number {
  return pitIndexesOf(player).reduce((acc, i) => acc + board[i], 0);
}
