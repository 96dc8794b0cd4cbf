import type { Piece, Player } from "../types.ts";
import type { Position } from "./coords.ts";

export type MoveResult = "invalid" | "success" | "check" | "checkmate" | "stalemate";

export interface Move {
  from: Position;
  to: Position;
}

/**
 * Everything needed to reverse one committed move. `moved` is the piece as it
 * stood before the move, so its `pos` and `hasMoved` are the pre-move values.
 */
export interface MoveRecord {
  readonly from: Position;
  readonly to: Position;
  readonly moved: Readonly<Piece>;
  readonly captured: Readonly<Piece> | null;
  readonly promoted: boolean;
  readonly previousTurn: Player;
}

export function isCommitted(result: MoveResult): boolean {
  return result !== "invalid";
}
