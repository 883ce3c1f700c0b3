// src/engine/constants.ts

export const PITS_PER_SIDE = 6;
export const SLOTS_PER_SIDE = PITS_PER_SIDE + 1;
export const SLOT_COUNT = SLOTS_PER_SIDE * 2;

export const DEFAULT_SEEDS_PER_PIT = 4;

// Store slot per player index.
export const STORES: readonly [number, number] = [6, 13];

// Pit letters in slot order; "." marks player 0's store. Player 1's store has no letter.
export const PIT_LABELS = "abcdef.ghijkl";

/** Wrap a slot index to [0, SLOT_COUNT). */
export function normalizeSlotIndex(i: number): number {
  const m = i % SLOT_COUNT;
  return m < 0 ? m + SLOT_COUNT : m;
}
