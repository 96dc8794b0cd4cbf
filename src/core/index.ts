// "Core" is the stable, deterministic rules surface (no rendering, no input handling).

export type { Grid, Piece, PieceKind, PieceView, Player } from "../types.ts";
export type { Position } from "../game/coords.ts";
export type { Move, MoveRecord, MoveResult } from "../game/moveTypes.ts";
export type { BoardSnapshot, PiecePlacement } from "../game/board.ts";
export type { HistoryEntry } from "../game/historyManager.ts";
export type { EngineConfig } from "../config.ts";

export { Board } from "../game/board.ts";
export { GameController } from "../controller/gameController.ts";
export { a1ToPosition, inBounds, makePosition, positionToA1, samePosition } from "../game/coords.ts";
export { createPiece } from "../game/pieces.ts";
export { isPromotion, validMoves } from "../game/movegen.ts";
export { findKing, hasLegalMoves, isInCheck, withSimulatedMove } from "../game/check.ts";
export { describeOutcome } from "../game/gameOver.ts";
export { resolveEngineConfig } from "../config.ts";
