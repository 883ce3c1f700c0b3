import { describe, it, expect } from "vitest";
import { runScenario } from "./runScenario";
import { legalPits } from "../../src/engine";
import { boardOf, stateWith } from "../helpers";

describe("Scenario: end of round", () => {
  it("emptying the mover's last pit ends the round; the other side keeps its pits", () => {
    const initial = stateWith(boardOf([0, 0, 0, 0, 0, 1], 23, [0, 0, 0, 2, 0, 0], 22));

    const { next } = runScenario({
      name: "p0 plays out",
      initial,
      pit: 5,
      expectLegalPits: [5],
      expectPhase: "ended",
    });

    expect(next.board).toEqual([0, 0, 0, 0, 0, 0, 24, 0, 0, 0, 2, 0, 0, 22]);
    expect(next.result).toEqual({ kind: "tie", scores: [24, 24] });
  });

  it("a capture that empties the opponent's side ends the round", () => {
    // p0 sows b (1) into empty c (2); opposite of c is j (10), p1's only seeds.
    const initial = stateWith(boardOf([3, 1, 0, 0, 0, 0], 20, [0, 0, 0, 2, 0, 0], 22));

    const { next, effect } = runScenario({
      name: "p0 captures the last seeds",
      initial,
      pit: 1,
      expectPhase: "ended",
    });

    expect(effect.capture).toEqual({ player: 0, pit: 2, oppositePit: 10, seeds: 3 });
    expect(next.result).toEqual({ kind: "win", winner: 0, scores: [26, 22] });
    expect(legalPits(next, 0)).toEqual([]);
    expect(legalPits(next, 1)).toEqual([]);
  });
});
