import type { GameState, PlayerIndex } from "../types";
import type { MoveSource, TurnChoice } from "../driver/moveSource";
import { parsePitSelection, pitPrompt } from "../ui/prompts";
import type { Terminal } from "./lineTerminal";

/**
 * Interactive source: asks until the answer names a pit letter (or q).
 * Rule checks (own pit, non-empty) happen in the engine; the driver re-asks on rejection.
 */
export function terminalMoveSource(term: Terminal): MoveSource {
  return {
    async getMove(state: GameState, player: PlayerIndex): Promise<TurnChoice> {
      for (;;) {
        term.print();
        const answer = await term.ask(pitPrompt(state.names[player]));
        if (answer === null) return { kind: "quit" };

        const sel = parsePitSelection(answer);
        if (sel.kind === "invalid") {
          term.print(sel.message);
          continue;
        }
        return sel;
      }
    },
  };
}
