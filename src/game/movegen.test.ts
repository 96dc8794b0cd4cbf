import { describe, it, expect } from "vitest";
import { isPromotion, validMoves } from "./movegen.ts";
import { a1ToPosition as sq, positionToA1, squareIndex } from "./coords.ts";
import { createPiece } from "./pieces.ts";
import type { Grid, Piece, PieceKind, Player } from "../types.ts";

function mkGrid(entries: Array<[string, PieceKind, Player]>): Grid {
  const grid: Grid = Array.from({ length: 64 }, () => null);
  for (const [label, kind, owner] of entries) {
    const pos = sq(label);
    grid[squareIndex(pos)] = createPiece(kind, owner, pos);
  }
  return grid;
}

function pieceOn(grid: Grid, label: string): Piece {
  const p = grid[squareIndex(sq(label))];
  if (!p) throw new Error(`no piece on ${label}`);
  return p;
}

function targets(grid: Grid, label: string): string[] {
  return validMoves(pieceOn(grid, label), grid).map(positionToA1).sort();
}

describe("movegen", () => {
  it("rook rays stop at blockers, capturing enemies only", () => {
    const grid = mkGrid([
      ["d4", "R", "W"],
      ["d6", "P", "B"],
      ["f4", "N", "W"],
    ]);
    expect(targets(grid, "d4")).toEqual(
      ["a4", "b4", "c4", "d1", "d2", "d3", "d5", "d6", "e4"].sort(),
    );
  });

  it("bishop covers diagonals from a corner", () => {
    const grid = mkGrid([["a1", "B", "W"]]);
    expect(targets(grid, "a1")).toEqual(["b2", "c3", "d4", "e5", "f6", "g7", "h8"]);
  });

  it("queen is rook plus bishop", () => {
    const grid = mkGrid([
      ["d4", "Q", "B"],
      ["d5", "P", "B"],
      ["e5", "P", "W"],
    ]);
    expect(targets(grid, "d4")).toEqual([
      "a1", "a4", "a7", "b2", "b4", "b6", "c3", "c4", "c5", "d1",
      "d2", "d3", "e3", "e4", "e5", "f2", "f4", "g1", "g4", "h4",
    ]);
  });

  it("knight jumps over pieces and skips own-colored targets", () => {
    const grid = mkGrid([
      ["b1", "N", "W"],
      ["d2", "P", "W"],
      ["b2", "P", "W"],
      ["c3", "P", "B"],
    ]);
    expect(targets(grid, "b1")).toEqual(["a3", "c3"]);
  });

  it("king steps to adjacent squares only", () => {
    const grid = mkGrid([
      ["e1", "K", "W"],
      ["e2", "P", "W"],
      ["f2", "P", "B"],
    ]);
    expect(targets(grid, "e1")).toEqual(["d1", "d2", "f1", "f2"]);
  });

  it("white pawn: single and double step from the start row", () => {
    const grid = mkGrid([["e2", "P", "W"]]);
    expect(targets(grid, "e2")).toEqual(["e3", "e4"]);
  });

  it("black pawn moves toward higher rows", () => {
    const grid = mkGrid([["c7", "P", "B"]]);
    expect(validMoves(pieceOn(grid, "c7"), grid)).toEqual([
      { x: 2, y: 2 },
      { x: 2, y: 3 },
    ]);
  });

  it("pawn is blocked straight ahead and double step needs both squares empty", () => {
    const blocked = mkGrid([
      ["e2", "P", "W"],
      ["e3", "N", "B"],
    ]);
    expect(targets(blocked, "e2")).toEqual([]);

    const farBlocked = mkGrid([
      ["e2", "P", "W"],
      ["e4", "N", "B"],
    ]);
    expect(targets(farBlocked, "e2")).toEqual(["e3"]);
  });

  it("pawn captures diagonally only onto enemy pieces", () => {
    const grid = mkGrid([
      ["d4", "P", "W"],
      ["c5", "P", "B"],
      ["e5", "P", "W"],
    ]);
    expect(targets(grid, "d4")).toEqual(["c5", "d5"]);
  });

  it("pawn off its start row has no double step", () => {
    const grid = mkGrid([["a3", "P", "W"]]);
    expect(targets(grid, "a3")).toEqual(["a4"]);
  });

  it("does not mutate the grid", () => {
    const grid = mkGrid([
      ["d4", "Q", "W"],
      ["d7", "P", "B"],
    ]);
    const before = JSON.stringify(grid);
    validMoves(pieceOn(grid, "d4"), grid);
    expect(JSON.stringify(grid)).toBe(before);
  });

  it("detects promotion rows per color", () => {
    expect(isPromotion(createPiece("P", "W", sq("a8")))).toBe(true);
    expect(isPromotion(createPiece("P", "B", sq("a1")))).toBe(true);
    expect(isPromotion(createPiece("P", "W", sq("a1")))).toBe(false);
    expect(isPromotion(createPiece("R", "W", sq("a8")))).toBe(false);
  });
});
