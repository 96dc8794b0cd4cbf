import type { Grid, Piece, Player } from "../types.ts";
import { inBounds, type Position } from "./coords.ts";

type Dir = { dx: number; dy: number };

const ORTHO: readonly Dir[] = [
  { dx: 1, dy: 0 },
  { dx: -1, dy: 0 },
  { dx: 0, dy: 1 },
  { dx: 0, dy: -1 },
];

const DIAG: readonly Dir[] = [
  { dx: 1, dy: 1 },
  { dx: 1, dy: -1 },
  { dx: -1, dy: 1 },
  { dx: -1, dy: -1 },
];

const ALL_DIRS: readonly Dir[] = [...ORTHO, ...DIAG];

const KNIGHT_JUMPS: readonly Dir[] = [
  { dx: 1, dy: 2 },
  { dx: 2, dy: 1 },
  { dx: -1, dy: 2 },
  { dx: -2, dy: 1 },
  { dx: 1, dy: -2 },
  { dx: 2, dy: -1 },
  { dx: -1, dy: -2 },
  { dx: -2, dy: -1 },
];

function at(grid: Grid, x: number, y: number): Piece | null {
  return grid[y * 8 + x] ?? null;
}

function canMoveTo(grid: Grid, x: number, y: number, own: Player): boolean {
  if (!inBounds(x, y)) return false;
  const target = at(grid, x, y);
  return !target || target.owner !== own;
}

export function pawnDir(player: Player): number {
  // White starts on rows 6/7 and moves toward row 0.
  return player === "W" ? -1 : 1;
}

export function pawnStartRow(player: Player): number {
  return player === "W" ? 6 : 1;
}

export function pawnPromotionRow(player: Player): number {
  return player === "W" ? 0 : 7;
}

function slidingMoves(grid: Grid, piece: Piece, dirs: readonly Dir[]): Position[] {
  const out: Position[] = [];
  for (const { dx, dy } of dirs) {
    let x = piece.pos.x + dx;
    let y = piece.pos.y + dy;
    while (inBounds(x, y)) {
      const target = at(grid, x, y);
      if (!target) {
        out.push({ x, y });
      } else {
        if (target.owner !== piece.owner) out.push({ x, y });
        break;
      }
      x += dx;
      y += dy;
    }
  }
  return out;
}

function stepMoves(grid: Grid, piece: Piece, offsets: readonly Dir[]): Position[] {
  const out: Position[] = [];
  for (const { dx, dy } of offsets) {
    const x = piece.pos.x + dx;
    const y = piece.pos.y + dy;
    if (canMoveTo(grid, x, y, piece.owner)) out.push({ x, y });
  }
  return out;
}

function pawnMoves(grid: Grid, piece: Piece): Position[] {
  const out: Position[] = [];
  const dy = pawnDir(piece.owner);
  const { x, y } = piece.pos;

  // Forward 1, then forward 2 from the start row
  if (inBounds(x, y + dy) && !at(grid, x, y + dy)) {
    out.push({ x, y: y + dy });
    if (y === pawnStartRow(piece.owner) && inBounds(x, y + 2 * dy) && !at(grid, x, y + 2 * dy)) {
      out.push({ x, y: y + 2 * dy });
    }
  }

  // Captures
  for (const dx of [-1, 1]) {
    const nx = x + dx;
    const ny = y + dy;
    if (!inBounds(nx, ny)) continue;
    const target = at(grid, nx, ny);
    if (target && target.owner !== piece.owner) out.push({ x: nx, y: ny });
  }

  return out;
}

/**
 * Pseudo-legal destinations for `piece`: movement pattern plus occupancy,
 * without regard to the safety of its own king. Never mutates `grid`.
 */
export function validMoves(piece: Piece, grid: Grid): Position[] {
  switch (piece.kind) {
    case "R":
      return slidingMoves(grid, piece, ORTHO);
    case "B":
      return slidingMoves(grid, piece, DIAG);
    case "Q":
      return slidingMoves(grid, piece, ALL_DIRS);
    case "N":
      return stepMoves(grid, piece, KNIGHT_JUMPS);
    case "K":
      return stepMoves(grid, piece, ALL_DIRS);
    case "P":
      return pawnMoves(grid, piece);
    default: {
      const unreachable: never = piece.kind;
      throw new Error(`validMoves: unknown piece kind ${String(unreachable)}`);
    }
  }
}

export function isPromotion(piece: Piece): boolean {
  return piece.kind === "P" && piece.pos.y === pawnPromotionRow(piece.owner);
}
