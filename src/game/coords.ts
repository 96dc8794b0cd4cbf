export const BOARD_SIZE = 8;

export interface Position {
  readonly x: number;
  readonly y: number;
}

export function inBounds(x: number, y: number): boolean {
  return x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE;
}

export function isOnBoard(pos: Position): boolean {
  return Number.isInteger(pos.x) && Number.isInteger(pos.y) && inBounds(pos.x, pos.y);
}

export function makePosition(x: number, y: number): Position {
  return { x, y };
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function squareIndex(pos: Position): number {
  return pos.y * BOARD_SIZE + pos.x;
}

export function positionAt(index: number): Position {
  return { x: index % BOARD_SIZE, y: Math.floor(index / BOARD_SIZE) };
}

// Rows are addressed top-to-bottom (y0 is rank 8). Labels are file letter + rank, bottom-to-top.
export function positionToA1(pos: Position): string {
  if (!isOnBoard(pos)) return `(${pos.x},${pos.y})`;
  const file = String.fromCharCode("a".charCodeAt(0) + pos.x);
  return `${file}${BOARD_SIZE - pos.y}`;
}

export function a1ToPosition(label: string): Position {
  const m = /^([a-h])([1-8])$/.exec(label.trim().toLowerCase());
  if (!m) throw new Error(`Invalid square label: ${label}`);
  const x = m[1].charCodeAt(0) - "a".charCodeAt(0);
  const y = BOARD_SIZE - Number(m[2]);
  return { x, y };
}
