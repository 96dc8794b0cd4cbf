import type { Player } from "../types.ts";
import type { MoveRecord } from "./moveTypes.ts";
import { positionToA1 } from "./coords.ts";
import { clonePiece } from "./pieces.ts";

export interface HistoryEntry {
  index: number;
  mover: Player;
  from: string;
  to: string;
  promoted: boolean;
  captured: boolean;
}

/**
 * Last-in-first-out stack of committed moves.
 * `push` and `peek` clone, so callers never hold a record that is still on the stack.
 */
export class HistoryManager {
  private records: MoveRecord[] = [];

  /**
   * Record a committed move.
   */
  push(record: MoveRecord): void {
    this.records.push(this.cloneRecord(record));
  }

  /**
   * Remove and return the most recent record, or null if there is none.
   */
  pop(): MoveRecord | null {
    const top = this.records.pop();
    return top ?? null;
  }

  peek(): MoveRecord | null {
    const top = this.records[this.records.length - 1];
    return top ? this.cloneRecord(top) : null;
  }

  canUndo(): boolean {
    return this.records.length > 0;
  }

  size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
  }

  /**
   * Overview of the stack, oldest first, for a move list.
   */
  getHistory(): HistoryEntry[] {
    return this.records.map((r, idx) => ({
      index: idx,
      mover: r.previousTurn,
      from: positionToA1(r.from),
      to: positionToA1(r.to),
      promoted: r.promoted,
      captured: r.captured !== null,
    }));
  }

  private cloneRecord(record: MoveRecord): MoveRecord {
    return {
      from: { ...record.from },
      to: { ...record.to },
      moved: clonePiece(record.moved),
      captured: record.captured ? clonePiece(record.captured) : null,
      promoted: record.promoted,
      previousTurn: record.previousTurn,
    };
  }
}
