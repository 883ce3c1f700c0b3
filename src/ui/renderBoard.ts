// src/ui/renderBoard.ts
//
// Pure text rendering. Every function takes an immutable snapshot and returns text;
// nothing here touches the terminal.
//
// Layout (player 0 on top, read right-to-left; player 1 below, left-to-right):
//
//      ↓  f  e  d  c  b  a  ←  Ann
//      0  4  4  4  4  4  4
//     ------------------------
//         4  4  4  4  4  4  0
//   Bob  →  g  h  i  j  k  l  ↑

import type { Board, Capture, PlayerIndex, RoundResult } from "../types";
import { PIT_LABELS } from "../engine/constants";

export type BoardSnapshot = {
  board: Board;
  names: readonly [string, string];
  currentPlayer?: PlayerIndex;
};

function slot(n: number): string {
  return String(n).padStart(2);
}

export function renderBoardLines({ board, names }: BoardSnapshot): string[] {
  const pad = " ".repeat(names[1].length);

  // Store first, then pits f..a.
  const top = board.slice(0, 7).reverse();
  const bottom = board.slice(7, 14);

  return [
    `${pad}  ↓  f  e  d  c  b  a  ←  ${names[0]}`,
    `${pad} ${top.map(slot).join(" ")}`,
    `${pad} ${"-".repeat(24)}`,
    `${pad}    ${bottom.map(slot).join(" ")}`,
    `${names[1]}  →  g  h  i  j  k  l  ↑`,
  ];
}

export function renderBoard(snapshot: BoardSnapshot): string {
  return renderBoardLines(snapshot).join("\n");
}

export function renderStatus({ names, currentPlayer }: BoardSnapshot): string {
  if (currentPlayer === undefined) return "";
  return `${names[currentPlayer]} to move.`;
}

/** Letter shown for a pit index, or "" for the stores. */
export function pitLabel(index: number): string {
  const label = PIT_LABELS.charAt(index);
  return label === "." ? "" : label;
}

export function renderCapture(names: readonly [string, string], capture: Capture): string {
  return (
    `${names[capture.player]} captured the contents of pits ` +
    `${pitLabel(capture.oppositePit)} and ${pitLabel(capture.pit)}`
  );
}

export function renderExtraTurn(names: readonly [string, string], player: PlayerIndex): string {
  return `${names[player]} gets an extra turn!`;
}

export function renderResult(names: readonly [string, string], result: RoundResult): string {
  if (result.kind === "tie") return "Tie game!";

  const [s0, s1] = result.scores;
  return `${names[result.winner]} wins ${Math.max(s0, s1)} to ${Math.min(s0, s1)}.`;
}
