import type { GameState } from "../types";
import { serializeState } from "./serialization";

/**
 * Deterministic hash of GameState.
 * Used to check a round's move log.
 */
export function hashState(state: GameState): string {
  // Determinism is the goal. This builds on serialization with a fixed key order.
  return serializeState(state);
}
