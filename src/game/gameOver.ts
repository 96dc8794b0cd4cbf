import type { Grid, Player } from "../types.ts";
import type { MoveResult } from "./moveTypes.ts";
import { hasLegalMoves, isInCheck } from "./check.ts";
import { playerName } from "./pieces.ts";

/**
 * Classify the position for the side about to move, right after a move was committed.
 * @param sideToMove - The player whose turn it now is
 */
export function classifyAfterMove(grid: Grid, sideToMove: Player): Exclude<MoveResult, "invalid"> {
  const inCheck = isInCheck(grid, sideToMove);
  const canMove = hasLegalMoves(grid, sideToMove);

  if (!canMove) return inCheck ? "checkmate" : "stalemate";
  return inCheck ? "check" : "success";
}

/**
 * End-of-game status line, or null while the game continues.
 */
export function describeOutcome(gameOver: boolean, winner: Player | null): string | null {
  if (!gameOver) return null;
  if (winner === null) return "Stalemate! Game ended in a draw.";
  return `Checkmate! ${playerName(winner)} wins!`;
}
