import type { Piece, PieceKind, Player } from "../types.ts";
import { BOARD_SIZE } from "./coords.ts";
import { createPiece } from "./pieces.ts";

export const BACK_RANK: readonly PieceKind[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

function homeRows(player: Player): { back: number; pawns: number } {
  return player === "W" ? { back: 7, pawns: 6 } : { back: 0, pawns: 1 };
}

/** The standard 32-piece layout, Black on rows 0/1 and White on rows 6/7. */
export function computeStartingPieces(): Piece[] {
  const out: Piece[] = [];
  for (const player of ["B", "W"] as const) {
    const { back, pawns } = homeRows(player);
    for (let x = 0; x < BOARD_SIZE; x++) {
      out.push(createPiece("P", player, { x, y: pawns }));
      out.push(createPiece(BACK_RANK[x], player, { x, y: back }));
    }
  }
  return out;
}
