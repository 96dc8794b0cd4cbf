import { describe, it, expect } from "vitest";
import { Board } from "./board.ts";
import { playRandomGame } from "./randomPlayout.ts";
import { createPrng } from "../shared/prng.ts";

const QUIET = { moveLog: false, logTag: "[test]" };

describe("createPrng", () => {
  it("is deterministic per seed", () => {
    const a = createPrng("seed");
    const b = createPrng("seed");
    const seqA = Array.from({ length: 5 }, () => a.int(0, 100));
    const seqB = Array.from({ length: 5 }, () => b.int(0, 100));
    expect(seqA).toEqual(seqB);
    for (const n of seqA) {
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(100);
    }
  });

  it("refuses to pick from an empty list", () => {
    expect(() => createPrng(1).pick([])).toThrow("pick() from empty array");
  });
});

describe("playRandomGame", () => {
  it("replays the same game for the same seed", () => {
    const one = new Board(QUIET);
    one.initialize();
    const two = new Board(QUIET);
    two.initialize();

    const movesOne = playRandomGame(one, { plies: 20, seed: "replay" });
    const movesTwo = playRandomGame(two, { plies: 20, seed: "replay" });
    expect(movesOne).toEqual(movesTwo);
    expect(one.snapshot()).toEqual(two.snapshot());
  });

  it("records every played move in the history and alternates turns", () => {
    const board = new Board(QUIET);
    board.initialize();
    const turns: string[] = [];
    const moves = playRandomGame(board, {
      plies: 12,
      seed: 7,
      onMove: () => turns.push(board.currentTurn),
    });
    expect(board.getHistory()).toHaveLength(moves.length);
    turns.forEach((t, i) => expect(t).toBe(i % 2 === 0 ? "B" : "W"));
  });
});
