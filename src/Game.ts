/**
 * Game: the controller and its session state machine.
 *
 * Phases
 * ------
 *  PLAYING    a piece is falling; ticks keep getting scheduled
 *  GAME_OVER  a freshly spawned piece had nowhere to go; terminal
 *
 * Timing is driven by the TickScheduler the host provides: every `update()`
 * schedules the next one while the game is still playing. Input arrives as
 * discrete key-down / key-up calls. No pixi.js or DOM imports live here.
 */

import { type BoardGrid, cellsFit, clearFullRows, cloneBoard, createEmptyBoard, lockCells } from './Board';
import { type GameConfig } from './Config';
import { Piece } from './Piece';
import { type RandomSource, Rng, pick } from './Rng';
import { type GameKey, type GameSurface, type KeyHandler } from './Surface';
import { OUTLINE_COLOR, getCells, shapeWidth } from './Tetromino';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type GamePhase = 'PLAYING' | 'GAME_OVER';

export interface GameState {
  phase: GamePhase;
  board: BoardGrid;
  piece: Piece;
  score: number;
  /** Pixels the piece will fall on the next tick. */
  dropSpeed: number;
  softDropHeld: boolean;
}

export interface GameOptions {
  /** Defaults to an Rng seeded from `config.seed` or the clock. */
  random?: RandomSource;
  /** Starting board; copied, never shared. Defaults to an empty one. */
  board?: BoardGrid;
}

export const GAME_OVER_TEXT = 'GAME OVER';
const GAME_OVER_FONT_SIZE = 30;

export function formatScore(score: number): string {
  return `Score: ${score}`;
}

export function formatGameOverTitle(title: string, score: number): string {
  return `${title} (${GAME_OVER_TEXT}, ${formatScore(score)})`;
}

// ---------------------------------------------------------------------------
// Game class
// ---------------------------------------------------------------------------

export class Game implements KeyHandler {
  private readonly config: GameConfig;
  private readonly surface: GameSurface;
  private readonly random: RandomSource;

  private phase: GamePhase = 'PLAYING';
  private board: BoardGrid;
  private piece: Piece;
  private score = 0;
  private dropSpeed: number;
  private softDropHeld = false;
  private started = false;

  // Exposed callbacks so external systems can react without polling
  onLinesCleared?: (count: number, score: number) => void;
  onGameOver?: (score: number) => void;

  constructor(config: GameConfig, surface: GameSurface, options: GameOptions = {}) {
    this.config = config;
    this.surface = surface;
    this.random = options.random ?? new Rng(config.seed ?? Date.now());
    this.board = options.board
      ? cloneBoard(options.board)
      : createEmptyBoard(config.boardWidth, config.boardHeight);
    this.dropSpeed = config.normalDropSpeed;
    this.piece = this.spawn();
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  get running(): boolean {
    return this.phase === 'PLAYING';
  }

  /** A copy of the session; writing to it never reaches the game. */
  getState(): Readonly<GameState> {
    return {
      phase: this.phase,
      board: cloneBoard(this.board),
      piece: this.piece.clone(),
      score: this.score,
      dropSpeed: this.dropSpeed,
      softDropHeld: this.softDropHeld,
    };
  }

  /** Shows the initial score and runs the first tick; later calls do nothing. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.surface.scoreLabel.setText(formatScore(this.score));
    this.log(`Started ${this.config.boardWidth}x${this.config.boardHeight}, tick=${this.config.tickIntervalMs}ms`);
    this.update();
  }

  // ---------------------------------------------------------------------------
  // Piece spawning
  // ---------------------------------------------------------------------------

  /** Spawns a random piece centred at the top, makes it the current one and returns a copy. */
  newPiece(): Piece {
    this.piece = this.spawn();
    return this.piece.clone();
  }

  private spawn(): Piece {
    const type = pick(this.random, this.config.pieceTypes);
    const color = pick(this.random, this.config.palette);
    const shape = this.config.shapes[type];
    const gridX = Math.floor(this.config.boardWidth / 2) - Math.floor(shapeWidth(shape) / 2);

    this.log(`Spawned ${color} ${type} at col=${gridX}`);
    return new Piece(type, shape, color, gridX);
  }

  // ---------------------------------------------------------------------------
  // Collision detection
  // ---------------------------------------------------------------------------

  /** True when the current piece, shifted by (dx, dy), fits the board. */
  validMove(dx: number, dy: number): boolean {
    return cellsFit(this.board, this.piece.cells(dx, dy));
  }

  // ---------------------------------------------------------------------------
  // Input
  // ---------------------------------------------------------------------------

  handleKeyDown(key: GameKey): void {
    if (!this.running) return;

    switch (key) {
      case 'Left':
        if (this.validMove(-1, 0)) this.piece.gridX -= 1;
        break;
      case 'Right':
        if (this.validMove(1, 0)) this.piece.gridX += 1;
        break;
      case 'Down':
        this.softDropHeld = true;
        this.dropSpeed = this.config.fastDropSpeed;
        break;
      case 'Up':
        this.tryRotate();
        break;
      default:
        break;
    }
  }

  /**
   * Only Down cares about release. The tick in progress keeps its speed;
   * the reset at the end of that tick falls back to normal.
   */
  handleKeyUp(key: GameKey): void {
    if (key === 'Down') this.softDropHeld = false;
  }

  private tryRotate(): void {
    const original = this.piece.shape;
    this.piece.rotate();
    if (!this.validMove(0, 0)) {
      this.piece.shape = original;
    }
  }

  // ---------------------------------------------------------------------------
  // Gravity tick
  // ---------------------------------------------------------------------------

  /** One tick: fall, maybe lock, redraw, then schedule the next tick. */
  update(): void {
    if (!this.running) return;

    const { cellSize } = this.config;
    const piece = this.piece;
    piece.pixelY += this.dropSpeed;

    if (piece.pixelY >= (piece.gridY + 1) * cellSize) {
      if (this.validMove(0, 1)) {
        piece.gridY += 1;
        piece.pixelY = piece.gridY * cellSize;
        if (!this.validMove(0, 1)) this.lockPiece();
      } else {
        // Slid under an overhang since the last boundary
        this.lockPiece();
      }
    }

    this.draw();

    this.dropSpeed = this.softDropHeld ? this.config.fastDropSpeed : this.config.normalDropSpeed;

    if (this.running) {
      this.surface.scheduler.schedule(this.config.tickIntervalMs, () => this.update());
    }
  }

  // ---------------------------------------------------------------------------
  // Locking
  // ---------------------------------------------------------------------------

  /** Burns the current piece into the board, clears rows and spawns the next piece. */
  lockPiece(): void {
    const piece = this.piece;
    this.board = lockCells(this.board, piece.cells(), piece.color);
    this.log(`Locked ${piece.type} at row=${piece.gridY}, col=${piece.gridX}`);

    this.clearFullRows();
    const next = this.newPiece();

    if (!this.validMove(0, 1) && next.gridY === 0) {
      this.triggerGameOver();
    }
  }

  /** Removes full rows, scores them and refreshes the score label. Returns the count. */
  clearFullRows(): number {
    const { board, cleared } = clearFullRows(this.board);
    this.board = board;
    this.score += cleared * this.config.pointsPerRow;
    this.surface.scoreLabel.setText(formatScore(this.score));

    if (cleared > 0) {
      this.log(`Cleared ${cleared} row(s), score=${this.score}`);
      this.onLinesCleared?.(cleared, this.score);
    }
    return cleared;
  }

  // ---------------------------------------------------------------------------
  // Game over
  // ---------------------------------------------------------------------------

  private triggerGameOver(): void {
    this.phase = 'GAME_OVER';
    this.softDropHeld = false;
    // Reported whatever the debug setting
    console.log(`[Game] Game over, score=${this.score}`);
    this.onGameOver?.(this.score);
  }

  // ---------------------------------------------------------------------------
  // Drawing
  // ---------------------------------------------------------------------------

  /** Repaints locked cells, the falling piece and, once over, the game-over message. */
  draw(): void {
    const { canvas } = this.surface;
    const cs = this.config.cellSize;
    canvas.clear();

    for (let r = 0; r < this.board.length; r++) {
      for (let c = 0; c < this.board[r].length; c++) {
        const cell = this.board[r][c];
        if (cell === null) continue;
        canvas.fillRect(c * cs, r * cs, (c + 1) * cs, (r + 1) * cs, {
          fill: cell,
          outline: OUTLINE_COLOR,
        });
      }
    }

    const piece = this.piece;
    for (const [r, c] of getCells(piece.shape)) {
      const x = (piece.gridX + c) * cs;
      const y = piece.pixelY + r * cs;
      canvas.fillRect(x, y, x + cs, y + cs, { fill: piece.color, outline: OUTLINE_COLOR });
    }

    if (this.phase === 'GAME_OVER') {
      canvas.drawText(
        Math.floor((this.config.boardWidth * cs) / 2),
        Math.floor((this.config.boardHeight * cs) / 2),
        GAME_OVER_TEXT,
        { fontSize: GAME_OVER_FONT_SIZE, color: 'red' },
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private log(msg: string): void {
    if (this.config.debug) console.log(`[Game] ${msg}`);
  }
}
