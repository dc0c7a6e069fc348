/**
 * Board: pure-logic module for the playfield.
 *
 * Rows are indexed 0 (top) … height-1 (bottom).
 * Columns are indexed 0 (left) … width-1 (right).
 *
 * Cell value: null = empty; PieceColor = locked piece material.
 */

import { type PieceColor } from './Tetromino';

/** A single cell: empty or locked with the colour of the piece that filled it. */
export type BoardCell = PieceColor | null;

/** The full playfield grid. Immutable by convention: functions here return new copies. */
export type BoardGrid = BoardCell[][];

// ---------------------------------------------------------------------------
// Board construction
// ---------------------------------------------------------------------------

export function createEmptyRow(width: number): BoardCell[] {
  return new Array<BoardCell>(width).fill(null);
}

export function createEmptyBoard(width: number, height: number): BoardGrid {
  return Array.from({ length: height }, () => createEmptyRow(width));
}

/** Deep-clone a board so mutations don't affect the original. */
export function cloneBoard(board: BoardGrid): BoardGrid {
  return board.map(row => [...row]);
}

export function boardWidth(board: BoardGrid): number {
  return board.length > 0 ? board[0].length : 0;
}

// ---------------------------------------------------------------------------
// Collision detection
// ---------------------------------------------------------------------------

/**
 * Returns true when every [row, col] lies inside the horizontal bounds,
 * above the floor and on an empty cell. Rows above the top (negative)
 * are allowed and never collide.
 */
export function cellsFit(board: BoardGrid, cells: Iterable<[number, number]>): boolean {
  const width = boardWidth(board);
  for (const [r, c] of cells) {
    if (c < 0 || c >= width) return false;
    if (r >= board.length) return false;
    if (r >= 0 && board[r][c] !== null) return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Locking
// ---------------------------------------------------------------------------

/**
 * Burns the cells into a new copy of the board and returns it.
 * Cells above the visible area (r < 0) are discarded.
 */
export function lockCells(
  board: BoardGrid,
  cells: Iterable<[number, number]>,
  color: PieceColor,
): BoardGrid {
  const next = cloneBoard(board);
  for (const [r, c] of cells) {
    if (r >= 0 && r < next.length) {
      next[r][c] = color;
    }
  }
  return next;
}

// ---------------------------------------------------------------------------
// Line clearing
// ---------------------------------------------------------------------------

export function isRowFull(row: readonly BoardCell[]): boolean {
  return row.every(cell => cell !== null);
}

/**
 * Drops every full row and prepends as many blank rows, so the height never
 * changes and the surviving rows keep their order. Returns a new board.
 */
export function clearFullRows(board: BoardGrid): { board: BoardGrid; cleared: number } {
  const remaining = board.filter(row => !isRowFull(row)).map(row => [...row]);
  const cleared = board.length - remaining.length;
  const blanks = Array.from({ length: cleared }, () => createEmptyRow(boardWidth(board)));
  return { board: [...blanks, ...remaining], cleared };
}
