import type { Board, Capture, GameState, MoveEffect, PlayerIndex, RoundResult } from "../types";
import { makeState } from "../engine/makeState";
import { sowingFrames } from "../engine/distribute";
import type { MoveLog } from "../engine/moveLog";
import type { EngineError } from "../engine/moveResponse";
import { tryApplyMoveWithResponse } from "../engine/tryApply";
import type { MoveSource } from "./moveSource";

/**
 * Hooks for a presentation layer. Every hook is awaited, so an observer may pause
 * (animation) before the driver continues.
 */
export interface RoundObserver {
  onStart?(state: GameState): void | Promise<void>;

  /** The chosen pit has been emptied; `board` holds no sown seeds yet. */
  onPickup?(board: Board, pit: number, player: PlayerIndex): void | Promise<void>;

  /** Once per sown seed; `board` is the board right after that seed landed. */
  onSow?(board: Board, index: number, player: PlayerIndex): void | Promise<void>;
  onCapture?(capture: Capture, state: GameState): void | Promise<void>;
  onExtraTurn?(player: PlayerIndex, state: GameState): void | Promise<void>;
  onMove?(state: GameState, effect: MoveEffect): void | Promise<void>;

  /** The choice was not a legal move; the same player is asked again. */
  onRejected?(player: PlayerIndex, error: EngineError, state: GameState): void | Promise<void>;
  onRoundOver?(state: GameState, result: RoundResult): void | Promise<void>;
}

export type PlayRoundOptions = {
  sources: readonly [MoveSource, MoveSource];

  // Defaults to a fresh canonical round.
  state?: GameState;
  observer?: RoundObserver;
};

export type RoundOutcome =
  | { kind: "completed"; state: GameState; result: RoundResult; log: MoveLog }
  | { kind: "quit"; player: PlayerIndex; state: GameState; log: MoveLog };

/**
 * Drive one round to its end:
 * - terminal check before every turn
 * - ask the current player's source; rejected choices are reported and re-asked
 * - apply, report, repeat (the engine decides extra turns)
 */
export async function playRound(opts: PlayRoundOptions): Promise<RoundOutcome> {
  const observer = opts.observer ?? {};
  let state = opts.state ?? makeState();
  let log: MoveLog = [];

  await observer.onStart?.(state);

  while (state.phase === "active") {
    const player = state.currentPlayer;
    const choice = await opts.sources[player].getMove(state, player);

    if (choice.kind === "quit") {
      return { kind: "quit", player, state, log };
    }

    const move = { kind: "sow", player, pit: choice.pit } as const;

    const res = tryApplyMoveWithResponse(state, move);
    if (!res.ok) {
      await observer.onRejected?.(player, res.error, state);
      continue;
    }

    const before = state;
    const { nextState, effect, logEntry } = res.result;
    state = nextState;
    log = [...log, logEntry];

    if (observer.onPickup || observer.onSow) {
      const frames = sowingFrames(before.board, move.pit, effect.path);
      await observer.onPickup?.(frames[0], move.pit, player);
      for (let i = 0; i < effect.path.length; i++) {
        await observer.onSow?.(frames[i + 1], effect.path[i], player);
      }
    }
    await observer.onMove?.(state, effect);
    if (effect.capture) await observer.onCapture?.(effect.capture, state);
    if (effect.extraTurn && state.phase === "active") await observer.onExtraTurn?.(player, state);
  }

  const result = state.result;
  if (!result) {
    throw new Error("playRound: ended state without result");
  }

  await observer.onRoundOver?.(state, result);
  return { kind: "completed", state, result, log };
}
