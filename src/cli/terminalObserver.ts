import { setTimeout as sleep } from "node:timers/promises";
import type { Board, GameState } from "../types";
import type { RoundObserver } from "../driver/roundDriver";
import { renderBoard, renderCapture, renderExtraTurn, renderResult } from "../ui/renderBoard";
import type { Terminal } from "./lineTerminal";

export type TerminalObserverOptions = {
  animate: boolean;
  sowDelayMs: number;
};

/** Redraws the board on a cleared screen and narrates captures, extra turns and results. */
export function terminalObserver(term: Terminal, opts: TerminalObserverOptions): RoundObserver {
  let names: GameState["names"] = ["", ""];

  const draw = async (board: Board) => {
    term.clear();
    term.print(renderBoard({ board, names }));
    if (opts.sowDelayMs > 0) await sleep(opts.sowDelayMs);
  };

  return {
    async onStart(state) {
      names = state.names;
      await draw(state.board);
    },

    async onPickup(board) {
      if (opts.animate) await draw(board);
    },

    async onSow(board) {
      if (opts.animate) await draw(board);
    },

    async onMove(state) {
      if (!opts.animate) await draw(state.board);
    },

    async onCapture(capture, state) {
      await draw(state.board);
      term.print(renderCapture(names, capture));
    },

    onExtraTurn(player) {
      term.print(renderExtraTurn(names, player));
    },

    onRejected(_player, error) {
      term.print(error.message);
    },

    async onRoundOver(state, result) {
      await draw(state.board);
      term.print();
      term.print(renderResult(names, result));
    },
  };
}
