// Public engine surface

export { makeState, initialBoard } from "./makeState";
export type { MakeStateOptions } from "./makeState";

// Board layout
export { PIT_LABELS, SLOT_COUNT, STORES, DEFAULT_SEEDS_PER_PIT } from "./constants";
export {
  isOwnPit,
  isOwnSlot,
  isStore,
  opponentOf,
  oppositePitIndex,
  pitIndexesOf,
  storeIndex,
} from "./boardMapping";

// Rules
export { validateMove } from "./validateMove";
export type { MoveValidation } from "./validateMove";
export { legalPits, listLegalMoves } from "./legalMoves";
export { distributeSeeds, sowingFrames } from "./distribute";
export { checkCapture } from "./capture";
export { applyMove } from "./applyMove";
export { isRoundOver, roundResult, score, scores } from "./gameOver";

// State serialization + deterministic hash
export { serializeState, deserializeState } from "./serialization";
export { hashState } from "./stateHash";
export { assertGameState, validateState } from "./validateState";

// Move log
export type { MoveLog, MoveLogEntry } from "./moveLog";
export { applyAndLog, reapplyMoveLog } from "./moveLog";

// Sync primitive
export { applyMoveWithSync } from "./sync";

// Envelope + try-apply
export type { MoveResponse, EngineError, EngineErrorCode, TurnContext } from "./moveResponse";
export { tryApplyMoveWithResponse } from "./tryApply";
