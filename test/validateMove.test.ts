import { describe, it, expect } from "vitest";
import { makeState } from "../src/engine/makeState";
import { validateMove } from "../src/engine/validateMove";
import type { PlayerIndex } from "../src/types";
import { boardOf, stateWith } from "./helpers";

function expectedOutcome(board: readonly number[], pit: number, player: PlayerIndex): string {
  if (pit === 6 || pit === 13) return "STORE_NOT_SELECTABLE";
  const own = player === 0 ? pit <= 6 : pit >= 7;
  if (!own) return "NOT_YOUR_PIT";
  if (board[pit] === 0) return "EMPTY_PIT";
  return "ok";
}

describe("validateMove", () => {
  it("classifies every (pit, player) pair exactly as the rules define", () => {
    const board = boardOf([0, 4, 4, 0, 4, 4], 2, [4, 0, 4, 4, 4, 0], 3);
    const state = stateWith(board);

    for (const player of [0, 1] as const) {
      for (let pit = 0; pit < 14; pit++) {
        const res = validateMove(state, pit, player);
        const got = res.ok ? "ok" : res.error.code;
        expect(got, `pit ${pit} player ${player}`).toBe(expectedOutcome(board, pit, player));
      }
    }
  });

  it("rejects stores before ownership (the opponent's store is still STORE_NOT_SELECTABLE)", () => {
    const state = makeState();

    const a = validateMove(state, 13, 0);
    const b = validateMove(state, 6, 1);

    expect(a.ok ? "ok" : a.error.code).toBe("STORE_NOT_SELECTABLE");
    expect(b.ok ? "ok" : b.error.code).toBe("STORE_NOT_SELECTABLE");
  });

  it("rejects an empty opponent pit as NOT_YOUR_PIT, not EMPTY_PIT", () => {
    const state = stateWith(boardOf([4, 4, 4, 4, 4, 4], 0, [0, 4, 4, 4, 4, 4], 4));

    const res = validateMove(state, 7, 0);
    expect(res.ok ? "ok" : res.error.code).toBe("NOT_YOUR_PIT");
  });

  it("carries a player-facing message for each failure", () => {
    const state = stateWith(boardOf([0, 4, 4, 4, 4, 4], 4, [4, 4, 4, 4, 4, 4], 0));

    const store = validateMove(state, 6, 0);
    const theirs = validateMove(state, 8, 0);
    const empty = validateMove(state, 0, 0);

    expect(store.ok ? "" : store.error.message).toBe("Sorry, you can't select the store.");
    expect(theirs.ok ? "" : theirs.error.message).toBe("Sorry, you don't control that pit.");
    expect(empty.ok ? "" : empty.error.message).toBe("Sorry, that pit is empty.");
  });

  it("is a pure query (contract: no mutation, repeatable)", () => {
    const state = makeState();
    const before = JSON.stringify(state);

    for (let i = 0; i < 3; i++) {
      expect(validateMove(state, 2, 0)).toEqual({ ok: true });
    }

    expect(JSON.stringify(state)).toBe(before);
  });
});
