import type { Board } from "../game/board.ts";
import type { MoveResult } from "../game/moveTypes.ts";
import { resolveEngineConfig, type EngineConfig } from "../config.ts";
import { positionToA1, samePosition, type Position } from "../game/coords.ts";
import { describeOutcome } from "../game/gameOver.ts";
import { isCommitted } from "../game/moveTypes.ts";
import { playerName } from "../game/pieces.ts";

/**
 * Click-driven selection on top of a `Board`. Input arrives already translated
 * to board squares; drawing reads the board plus the getters here.
 */
export class GameController {
  private readonly board: Board;
  private selected: Position | null = null;
  private status = "";
  private readonly config: EngineConfig;

  constructor(board: Board, config: EngineConfig = resolveEngineConfig()) {
    this.board = board;
    this.config = config;
  }

  getSelected(): Position | null {
    return this.selected;
  }

  isOver(): boolean {
    return this.board.gameOver;
  }

  /** End-of-game text wins over transient messages. */
  getStatusMessage(): string {
    return describeOutcome(this.board.gameOver, this.board.winner) ?? this.status;
  }

  getTurnText(): string {
    return `Turn: ${playerName(this.board.currentTurn)}`;
  }

  getHighlightedTargets(): Position[] {
    if (!this.selected) return [];
    return this.board.getLegalMoves(this.selected);
  }

  /**
   * Handle a click on `pos`. Returns the result when a move was attempted, else null.
   */
  selectSquare(pos: Position): MoveResult | null {
    if (this.board.gameOver) return null;
    this.status = "";

    if (!this.selected) {
      if (this.isOwnPiece(pos)) this.selected = pos;
      return null;
    }

    const from = this.selected;
    const result = this.board.movePiece(from, pos);
    this.logMove(from, pos, result);

    if (isCommitted(result)) {
      this.selected = null;
      if (result === "check") this.status = `${playerName(this.board.currentTurn)} is in check!`;
      return result;
    }

    if (samePosition(pos, from)) {
      this.selected = null;
    } else if (this.isOwnPiece(pos)) {
      this.selected = pos;
    }
    return result;
  }

  // Undo stays available after the game ends so a finished game can be taken back.
  undo(): boolean {
    const ok = this.board.undoLastMove();
    if (ok) {
      this.status = "Undo successful!";
      this.selected = null;
    } else {
      this.status = "No moves to undo!";
    }
    if (this.config.moveLog) console.log(`${this.config.logTag} undo ${ok ? "ok" : "empty"}`);
    return ok;
  }

  private isOwnPiece(pos: Position): boolean {
    const p = this.board.getPieceAt(pos);
    return Boolean(p && p.owner === this.board.currentTurn);
  }

  private logMove(from: Position, to: Position, result: MoveResult): void {
    if (!this.config.moveLog) return;
    console.log(`${this.config.logTag} move ${positionToA1(from)}->${positionToA1(to)} result=${result}`);
  }
}
