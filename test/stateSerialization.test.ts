import { describe, it, expect } from "vitest";
import { serializeState, deserializeState } from "../src/engine";
import { makeState } from "../src/engine/makeState";
import { boardOf, stateWith } from "./helpers";

describe("GameState serialization contract", () => {
  it("round-trips an active round without structural change", () => {
    const state = makeState({ names: ["Ann", "Bob"], seedsPerPit: 3 });

    const restored = deserializeState(serializeState(state));

    expect(restored).toEqual(state);
  });

  it("round-trips an ended round including its result", () => {
    const state = stateWith(boardOf([0, 0, 0, 0, 0, 0], 22, [1, 2, 0, 3, 1, 0], 19));

    const restored = deserializeState(serializeState(state));

    expect(restored.result).toEqual({ kind: "win", winner: 1, scores: [22, 26] });
  });

  it("rejects JSON that is not a valid state", () => {
    expect(() => deserializeState(JSON.stringify({ phase: "active" }))).toThrow(
      /validateState @ deserializeState/
    );
  });
});
