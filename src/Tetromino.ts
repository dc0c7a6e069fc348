/**
 * Tetromino definitions: the seven canonical pieces as 0/1 matrices,
 * the colour palette pieces are painted with, and matrix helpers.
 *
 * Each shape is a rows × cols grid where 1 = filled cell. Rotation is not
 * precomputed: `rotateCW` derives the next orientation from the current one.
 */

export type TetrominoType = 'I' | 'O' | 'T' | 'S' | 'Z' | 'L' | 'J';

/** A 2-D bitmask for one orientation of a piece. */
export type ShapeMatrix = ReadonlyArray<ReadonlyArray<number>>;

// ---------------------------------------------------------------------------
// Shape definitions
// ---------------------------------------------------------------------------

export const TETROMINO_SHAPES: Readonly<Record<TetrominoType, ShapeMatrix>> = {
  I: [[1, 1, 1, 1]],
  O: [[1, 1], [1, 1]],
  T: [[0, 1, 0], [1, 1, 1]],
  S: [[1, 1, 0], [0, 1, 1]],
  Z: [[0, 1, 1], [1, 1, 0]],
  L: [[1, 1, 1], [1, 0, 0]],
  J: [[1, 1, 1], [0, 0, 1]],
};

/** All seven piece types; spawn picks uniformly from this list. */
export const ALL_TYPES: readonly TetrominoType[] = ['I', 'O', 'T', 'S', 'Z', 'L', 'J'];

// ---------------------------------------------------------------------------
// Colours
// ---------------------------------------------------------------------------

/**
 * Piece colours are chosen independently of the shape, so a red I piece is
 * as likely as a cyan one.
 */
export type PieceColor = 'cyan' | 'yellow' | 'purple' | 'green' | 'red' | 'orange' | 'blue';

export const PIECE_COLORS: readonly PieceColor[] = [
  'cyan',
  'yellow',
  'purple',
  'green',
  'red',
  'orange',
  'blue',
];

export const OUTLINE_COLOR = 'black';

/** Anything the drawing surface can be asked to paint with. */
export type CellColor = PieceColor | typeof OUTLINE_COLOR;

export const COLOR_HEX: Readonly<Record<CellColor, number>> = {
  cyan:   0x00ffff,
  yellow: 0xffff00,
  purple: 0xa020f0,
  green:  0x00ff00,
  red:    0xff0000,
  orange: 0xffa500,
  blue:   0x0000ff,
  black:  0x000000,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Returns every [row, col] offset occupied by a shape, row-major. */
export function getCells(shape: ShapeMatrix): [number, number][] {
  const cells: [number, number][] = [];
  for (let r = 0; r < shape.length; r++) {
    for (let c = 0; c < shape[r].length; c++) {
      if (shape[r][c]) cells.push([r, c]);
    }
  }
  return cells;
}

export function shapeWidth(shape: ShapeMatrix): number {
  return shape.length > 0 ? shape[0].length : 0;
}

/**
 * Rotates a shape 90° clockwise: the transpose of the reversed row order.
 * An r×c input yields a fresh c×r matrix; the input is left untouched.
 */
export function rotateCW(shape: ShapeMatrix): number[][] {
  const rows = shape.length;
  const cols = shapeWidth(shape);
  return Array.from({ length: cols }, (_, c) =>
    Array.from({ length: rows }, (_, r) => shape[rows - 1 - r][c]),
  );
}
