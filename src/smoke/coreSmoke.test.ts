import { describe, it, expect } from "vitest";
import { a1ToPosition, Board, GameController, describeOutcome, type MoveResult } from "../core/index.ts";

describe("core surface smoke", () => {
  it("plays a short game through the public surface only", () => {
    const board = new Board({ moveLog: false, logTag: "[smoke]" });
    board.initialize();
    const controller = new GameController(board, { moveLog: false, logTag: "[smoke]" });

    const results: Array<MoveResult | null> = [];
    for (const label of ["e2", "e4", "e7", "e5", "g1", "f3"]) {
      results.push(controller.selectSquare(a1ToPosition(label)));
    }

    expect(results).toEqual([null, "success", null, "success", null, "success"]);
    expect(board.currentTurn).toBe("B");
    expect(board.getHistory().map((h) => `${h.from}${h.to}`)).toEqual(["e2e4", "e7e5", "g1f3"]);
    expect(describeOutcome(board.gameOver, board.winner)).toBeNull();
  });
});
