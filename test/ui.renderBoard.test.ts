import { describe, it, expect } from "vitest";
import {
  pitLabel,
  renderBoard,
  renderBoardLines,
  renderCapture,
  renderExtraTurn,
  renderResult,
  renderStatus,
} from "../src/ui/renderBoard";
import { initialBoard } from "../src/engine/makeState";
import { NAMES } from "./helpers";

describe("renderBoard", () => {
  it("draws the opening board with player 0 on top, read right to left", () => {
    const lines = renderBoardLines({ board: initialBoard(), names: NAMES });

    expect(lines).toEqual([
      "     ↓  f  e  d  c  b  a  ←  Ann",
      "     0  4  4  4  4  4  4",
      "    " + "-".repeat(24),
      "        4  4  4  4  4  4  0",
      "Bob  →  g  h  i  j  k  l  ↑",
    ]);
  });

  it("right-aligns two-digit counts in their column", () => {
    const board = [1, 2, 3, 0, 10, 4, 12, 0, 0, 0, 0, 0, 0, 16];

    const lines = renderBoardLines({ board, names: NAMES });

    expect(lines[1]).toBe("    12  4 10  0  3  2  1");
    expect(lines[3]).toBe("        0  0  0  0  0  0 16");
  });

  it("indents by the length of the second player's name", () => {
    const lines = renderBoardLines({ board: initialBoard(), names: ["Ann", "Beatrix"] });

    expect(lines[0]).toBe("         ↓  f  e  d  c  b  a  ←  Ann");
    expect(lines[4]).toBe("Beatrix  →  g  h  i  j  k  l  ↑");
  });

  it("joins the lines with newlines and does not modify the board", () => {
    const board = initialBoard();
    const text = renderBoard({ board, names: NAMES });

    expect(text.split("\n").length).toBe(5);
    expect(board).toEqual(initialBoard());
  });
});

describe("messages", () => {
  it("status names the player to move", () => {
    expect(renderStatus({ board: initialBoard(), names: NAMES, currentPlayer: 1 })).toBe("Bob to move.");
    expect(renderStatus({ board: initialBoard(), names: NAMES })).toBe("");
  });

  it("pit labels are letters; stores have none", () => {
    expect(pitLabel(0)).toBe("a");
    expect(pitLabel(12)).toBe("l");
    expect(pitLabel(6)).toBe("");
    expect(pitLabel(13)).toBe("");
  });

  it("capture names both pits by letter", () => {
    expect(renderCapture(NAMES, { player: 0, pit: 2, oppositePit: 10, seeds: 5 })).toBe(
      "Ann captured the contents of pits j and c"
    );
  });

  it("extra turn and results", () => {
    expect(renderExtraTurn(NAMES, 1)).toBe("Bob gets an extra turn!");
    expect(renderResult(NAMES, { kind: "tie", scores: [24, 24] })).toBe("Tie game!");
    expect(renderResult(NAMES, { kind: "win", winner: 1, scores: [21, 27] })).toBe("Bob wins 27 to 21.");
  });
});
