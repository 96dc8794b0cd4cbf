import type { Board } from "./board.ts";
import type { Move, MoveResult } from "./moveTypes.ts";
import { createPrng } from "../shared/prng.ts";

export type RandomPlayoutOptions = {
  plies: number;
  seed: number | string;
  /** Called after each committed move, e.g. to check properties along the way. */
  onMove?: (move: Move, result: MoveResult, ply: number) => void;
};

/**
 * Plays up to `plies` uniformly chosen legal moves on `board`, stopping early
 * when the game ends. Returns the moves that were played.
 */
export function playRandomGame(board: Board, opts: RandomPlayoutOptions): Move[] {
  const prng = createPrng(opts.seed);
  const played: Move[] = [];

  for (let ply = 0; ply < opts.plies && !board.gameOver; ply++) {
    const moves = board.getAllLegalMoves();
    if (moves.length === 0) break;

    const move = prng.pick(moves);
    const result = board.movePiece(move.from, move.to);
    if (result === "invalid") {
      throw new Error(`playRandomGame: legal move (${move.from.x},${move.from.y})->(${move.to.x},${move.to.y}) was rejected`);
    }
    played.push(move);
    opts.onMove?.(move, result, ply);
  }

  return played;
}
