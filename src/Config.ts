/**
 * Config: the immutable settings a Game is constructed with.
 *
 * Board size, timing, scoring and the piece set all live here, so two games
 * with different boards or speeds can coexist (tests rely on this).
 */

import {
  ALL_TYPES,
  PIECE_COLORS,
  TETROMINO_SHAPES,
  type PieceColor,
  type ShapeMatrix,
  type TetrominoType,
} from './Tetromino';

export interface GameConfig {
  readonly title: string;
  /** Board size in cells. */
  readonly boardWidth: number;
  readonly boardHeight: number;
  /** Pixel size of each grid cell. */
  readonly cellSize: number;
  /** Delay between the end of one tick and the start of the next. */
  readonly tickIntervalMs: number;
  /** Pixels the piece falls per tick. */
  readonly normalDropSpeed: number;
  readonly fastDropSpeed: number;
  readonly pointsPerRow: number;
  readonly pieceTypes: readonly TetrominoType[];
  readonly shapes: Readonly<Record<TetrominoType, ShapeMatrix>>;
  readonly palette: readonly PieceColor[];
  /** RNG seed; a time-based one is picked when absent. */
  readonly seed?: number;
  readonly debug: boolean;
}

export const DEFAULT_CONFIG: GameConfig = Object.freeze({
  title: 'Tetris',
  boardWidth: 10,
  boardHeight: 20,
  cellSize: 30,
  tickIntervalMs: 10,
  normalDropSpeed: 1,
  fastDropSpeed: 100,
  pointsPerRow: 100,
  pieceTypes: ALL_TYPES,
  shapes: TETROMINO_SHAPES,
  palette: PIECE_COLORS,
  debug: false,
});

export function createConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return Object.freeze({ ...DEFAULT_CONFIG, ...overrides });
}

/**
 * Reads overrides from a URL query string, e.g. `?seed=42&debug=1`.
 * Unrecognised or malformed values are left out.
 */
export function configFromQuery(search: string): Partial<GameConfig> {
  const params = new URLSearchParams(search);
  const overrides: { seed?: number; debug?: boolean } = {};

  const seed = params.get('seed');
  if (seed !== null && /^\d+$/.test(seed)) {
    overrides.seed = Number(seed) >>> 0;
  }

  const debug = params.get('debug');
  if (debug === '1' || debug === 'true') overrides.debug = true;
  if (debug === '0' || debug === 'false') overrides.debug = false;

  return overrides;
}

/** Canvas size in pixels for a given config. */
export function canvasSize(config: GameConfig): { width: number; height: number } {
  return {
    width: config.boardWidth * config.cellSize,
    height: config.boardHeight * config.cellSize,
  };
}
