import type { Grid, Piece, Player } from "../types.ts";
import type { Move } from "./moveTypes.ts";
import { isOnBoard, positionAt, samePosition, squareIndex, type Position } from "./coords.ts";
import { validMoves } from "./movegen.ts";
import { opponentOf } from "./pieces.ts";

function pieceAt(grid: Grid, pos: Position): Piece | null {
  return grid[squareIndex(pos)] ?? null;
}

export function findKing(grid: Grid, player: Player): Position | null {
  for (let i = 0; i < grid.length; i++) {
    const p = grid[i];
    if (p && p.kind === "K" && p.owner === player) return positionAt(i);
  }
  return null;
}

function isSquareAttacked(grid: Grid, square: Position, byPlayer: Player): boolean {
  for (const p of grid) {
    if (!p || p.owner !== byPlayer) continue;
    if (validMoves(p, grid).some((m) => samePosition(m, square))) return true;
  }
  return false;
}

/** No king on the board counts as not in check. */
export function isInCheck(grid: Grid, player: Player): boolean {
  const kingSq = findKing(grid, player);
  if (!kingSq) return false;
  return isSquareAttacked(grid, kingSq, opponentOf(player));
}

/**
 * Temporarily relocates the piece on `from` to `to`, runs `fn`, then puts
 * both squares back exactly as they were, whichever way `fn` exits.
 */
export function withSimulatedMove<T>(grid: Grid, from: Position, to: Position, fn: () => T): T {
  const fromIdx = squareIndex(from);
  const toIdx = squareIndex(to);
  const moving = grid[fromIdx];
  const target = grid[toIdx];
  if (!moving) throw new Error(`withSimulatedMove: no piece at (${from.x},${from.y})`);

  grid[toIdx] = { ...moving, pos: { x: to.x, y: to.y } };
  grid[fromIdx] = null;
  try {
    return fn();
  } finally {
    grid[fromIdx] = moving;
    grid[toIdx] = target;
  }
}

export function leavesKingInCheck(grid: Grid, from: Position, to: Position): boolean {
  const mover = pieceAt(grid, from);
  if (!mover) return false;
  return withSimulatedMove(grid, from, to, () => isInCheck(grid, mover.owner));
}

/** Destinations from `from` that pass the own-king safety filter. */
export function legalMovesFrom(grid: Grid, from: Position): Position[] {
  if (!isOnBoard(from)) return [];
  const piece = pieceAt(grid, from);
  if (!piece) return [];
  return validMoves(piece, grid).filter((to) => !leavesKingInCheck(grid, from, to));
}

export function allLegalMoves(grid: Grid, player: Player): Move[] {
  const out: Move[] = [];
  for (let i = 0; i < grid.length; i++) {
    const p = grid[i];
    if (!p || p.owner !== player) continue;
    const from = positionAt(i);
    for (const to of legalMovesFrom(grid, from)) out.push({ from, to });
  }
  return out;
}

export function hasLegalMoves(grid: Grid, player: Player): boolean {
  for (let i = 0; i < grid.length; i++) {
    const p = grid[i];
    if (!p || p.owner !== player) continue;
    const from = positionAt(i);
    for (const to of validMoves(p, grid)) {
      if (!leavesKingInCheck(grid, from, to)) return true;
    }
  }
  return false;
}
