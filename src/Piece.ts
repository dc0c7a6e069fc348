import { type PieceColor, type ShapeMatrix, type TetrominoType, getCells, rotateCW } from './Tetromino';

/**
 * The currently falling tetromino.
 *
 * `gridX`/`gridY` anchor the shape's top-left corner in board cells.
 * `pixelY` is where that anchor row is drawn; it runs ahead of `gridY * cellSize`
 * between row advances so the fall animates smoothly.
 */
export class Piece {
  shape: ShapeMatrix;
  readonly type: TetrominoType;
  readonly color: PieceColor;
  gridX: number;
  gridY = 0;
  pixelY = 0;

  constructor(type: TetrominoType, shape: ShapeMatrix, color: PieceColor, gridX: number) {
    this.type = type;
    this.shape = shape;
    this.color = color;
    this.gridX = gridX;
  }

  /** Replaces the shape with its clockwise rotation. Callers validate and may restore the old one. */
  rotate(): void {
    this.shape = rotateCW(this.shape);
  }

  /** Detached copy; the shape matrix is shared since it is never mutated in place. */
  clone(): Piece {
    const copy = new Piece(this.type, this.shape, this.color, this.gridX);
    copy.gridY = this.gridY;
    copy.pixelY = this.pixelY;
    return copy;
  }

  /** Absolute [row, col] board positions of every filled cell, shifted by (dx, dy). */
  cells(dx = 0, dy = 0): [number, number][] {
    return getCells(this.shape).map(([r, c]) => [r + this.gridY + dy, c + this.gridX + dx]);
  }
}
