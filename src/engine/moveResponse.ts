import type { PlayerIndex } from "../types";
import type { SyncResult } from "./sync";

/**
 * Recoverable move errors. The first three are rule failures an input layer can re-prompt on;
 * the rest guard the envelope against malformed or out-of-turn requests.
 */
export type EngineErrorCode =
  | "STORE_NOT_SELECTABLE"
  | "NOT_YOUR_PIT"
  | "EMPTY_PIT"
  | "INVALID_INPUT"
  | "WRONG_ACTOR"
  | "GAME_ENDED";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type TurnContext = {
  nextPlayer: PlayerIndex;

  // The mover's last seed landed in their own store.
  extraTurn: boolean;
  roundOver: boolean;
};

export type MoveOk = {
  ok: true;
  result: SyncResult;
  turn: TurnContext;
};

export type MoveErr = {
  ok: false;
  error: EngineError;
};

export type MoveResponse = MoveOk | MoveErr;
