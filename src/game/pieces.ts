import type { Piece, PieceKind, PieceView, Player } from "../types.ts";
import type { Position } from "./coords.ts";

export function playerName(p: Player): string {
  return p === "W" ? "White" : "Black";
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

/** Fresh, unmoved piece. Used for the starting layout and for promotion. */
export function createPiece(kind: PieceKind, owner: Player, pos: Position): Piece {
  return { kind, owner, pos: { x: pos.x, y: pos.y }, hasMoved: false };
}

export function clonePiece(piece: Piece): Piece {
  return { ...piece, pos: { x: piece.pos.x, y: piece.pos.y } };
}

export function toPieceView(piece: Piece): PieceView {
  return { kind: piece.kind, owner: piece.owner, pos: { x: piece.pos.x, y: piece.pos.y } };
}
