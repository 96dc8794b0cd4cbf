import type { Position } from "./game/coords.ts";

export type Player = "W" | "B";
export type PieceKind = "R" | "N" | "B" | "Q" | "K" | "P";

export interface Piece {
  kind: PieceKind;
  owner: Player;
  pos: Position;
  hasMoved: boolean;
}

/** What the presentation layer gets back from `Board.getPieceAt`. */
export interface PieceView {
  readonly kind: PieceKind;
  readonly owner: Player;
  readonly pos: Position;
}

/** One slot per square, indexed `y * 8 + x`. */
export type Grid = Array<Piece | null>;
