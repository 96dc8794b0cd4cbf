import type { Grid, Piece, PieceKind, PieceView, Player } from "../types.ts";
import type { Move, MoveRecord, MoveResult } from "./moveTypes.ts";
import { resolveEngineConfig, type EngineConfig } from "../config.ts";
import { BOARD_SIZE, isOnBoard, positionToA1, samePosition, squareIndex, type Position } from "./coords.ts";
import { allLegalMoves, findKing, hasLegalMoves, isInCheck, legalMovesFrom } from "./check.ts";
import { classifyAfterMove } from "./gameOver.ts";
import { HistoryManager, type HistoryEntry } from "./historyManager.ts";
import { computeStartingPieces } from "./initialPosition.ts";
import { isPromotion, validMoves } from "./movegen.ts";
import { clonePiece, createPiece, opponentOf, toPieceView } from "./pieces.ts";

export interface PiecePlacement {
  kind: PieceKind;
  owner: Player;
  pos: Position;
  hasMoved?: boolean;
}

export interface BoardSnapshot {
  squares: Array<{ kind: PieceKind; owner: Player; x: number; y: number; hasMoved: boolean } | null>;
  currentTurn: Player;
  gameOver: boolean;
  winner: Player | null;
}

function emptyGrid(): Grid {
  return Array.from({ length: BOARD_SIZE * BOARD_SIZE }, () => null);
}

export class Board {
  private squares: Grid = emptyGrid();
  private turn: Player = "W";
  private over = false;
  private winnerPlayer: Player | null = null;
  private readonly history = new HistoryManager();
  private readonly config: EngineConfig;

  constructor(config: EngineConfig = resolveEngineConfig()) {
    this.config = config;
  }

  get currentTurn(): Player {
    return this.turn;
  }

  get gameOver(): boolean {
    return this.over;
  }

  get winner(): Player | null {
    return this.winnerPlayer;
  }

  /** Standard starting position, White to move, empty history. */
  initialize(): void {
    this.reset("W");
    for (const piece of computeStartingPieces()) {
      this.squares[squareIndex(piece.pos)] = piece;
    }
  }

  /**
   * Set up an arbitrary position. Each side needs exactly one king.
   */
  loadPosition(placements: readonly PiecePlacement[], toMove: Player = "W"): void {
    const next = emptyGrid();
    const kings: Record<Player, number> = { W: 0, B: 0 };

    for (const p of placements) {
      if (!isOnBoard(p.pos)) throw new Error(`loadPosition: square (${p.pos.x},${p.pos.y}) is off the board`);
      const idx = squareIndex(p.pos);
      if (next[idx]) throw new Error(`loadPosition: ${positionToA1(p.pos)} is occupied twice`);
      next[idx] = { ...createPiece(p.kind, p.owner, p.pos), hasMoved: Boolean(p.hasMoved) };
      if (p.kind === "K") kings[p.owner]++;
    }

    for (const player of ["W", "B"] as const) {
      if (kings[player] !== 1) {
        throw new Error(`loadPosition: expected exactly one ${player} king, found ${kings[player]}`);
      }
    }

    this.reset(toMove);
    this.squares = next;
  }

  getPieceAt(pos: Position): PieceView | null {
    if (!isOnBoard(pos)) return null;
    const p = this.squares[squareIndex(pos)];
    return p ? toPieceView(p) : null;
  }

  findKing(player: Player): Position | null {
    return findKing(this.squares, player);
  }

  isInCheck(player: Player): boolean {
    return isInCheck(this.squares, player);
  }

  hasLegalMoves(player: Player): boolean {
    return hasLegalMoves(this.squares, player);
  }

  getLegalMoves(from: Position): Position[] {
    return legalMovesFrom(this.squares, from);
  }

  getAllLegalMoves(): Move[] {
    return allLegalMoves(this.squares, this.turn);
  }

  movePiece(from: Position, to: Position): MoveResult {
    if (this.over) return "invalid";
    if (!isOnBoard(from) || !isOnBoard(to)) return "invalid";

    const fromIdx = squareIndex(from);
    const toIdx = squareIndex(to);
    const piece = this.squares[fromIdx];
    if (!piece || piece.owner !== this.turn) return "invalid";

    if (!validMoves(piece, this.squares).some((m) => samePosition(m, to))) return "invalid";

    const captured = this.squares[toIdx];
    if (captured && captured.kind === "K") {
      // A king can only be en prise here if the previous move left its own side in check.
      console.error(
        `${this.config.logTag} refusing king capture ${positionToA1(from)}->${positionToA1(to)}; position is inconsistent`,
      );
      return "invalid";
    }

    const previousTurn = this.turn;
    const movedBefore = clonePiece(piece);
    const capturedBefore = captured ? clonePiece(captured) : null;

    let landed: Piece = { ...piece, pos: { x: to.x, y: to.y }, hasMoved: true };
    const promoted = isPromotion(landed);
    if (promoted) landed = createPiece("Q", piece.owner, to);

    this.squares[toIdx] = landed;
    this.squares[fromIdx] = null;

    if (isInCheck(this.squares, previousTurn)) {
      this.squares[fromIdx] = piece;
      this.squares[toIdx] = captured;
      return "invalid";
    }

    this.turn = opponentOf(previousTurn);
    this.history.push({
      from: { x: from.x, y: from.y },
      to: { x: to.x, y: to.y },
      moved: movedBefore,
      captured: capturedBefore,
      promoted,
      previousTurn,
    });

    const result = classifyAfterMove(this.squares, this.turn);
    if (result === "checkmate") {
      this.over = true;
      this.winnerPlayer = previousTurn;
    } else if (result === "stalemate") {
      this.over = true;
      this.winnerPlayer = null;
    }
    return result;
  }

  /**
   * Reverse the most recent committed move. Returns false when there is nothing to undo.
   */
  undoLastMove(): boolean {
    const record = this.history.pop();
    if (!record) return false;
    this.restore(record);
    return true;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  getHistory(): HistoryEntry[] {
    return this.history.getHistory();
  }

  snapshot(): BoardSnapshot {
    return {
      squares: this.squares.map((p) =>
        p ? { kind: p.kind, owner: p.owner, x: p.pos.x, y: p.pos.y, hasMoved: p.hasMoved } : null,
      ),
      currentTurn: this.turn,
      gameOver: this.over,
      winner: this.winnerPlayer,
    };
  }

  private restore(record: MoveRecord): void {
    this.squares[squareIndex(record.from)] = clonePiece(record.moved);
    this.squares[squareIndex(record.to)] = record.captured ? clonePiece(record.captured) : null;
    this.turn = record.previousTurn;
    this.over = false;
    this.winnerPlayer = null;
  }

  private reset(toMove: Player): void {
    this.squares = emptyGrid();
    this.turn = toMove;
    this.over = false;
    this.winnerPlayer = null;
    this.history.clear();
  }
}
