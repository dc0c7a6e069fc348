/**
 * Surface: the contracts between the game core and whatever hosts it.
 *
 * The core never touches pixi.js or the DOM directly: it draws through a
 * DrawSurface, reports the score through a ScoreLabel and asks a
 * TickScheduler for its next tick. Renderer, Ui and TimeoutScheduler are the
 * browser implementations; tests supply recording fakes.
 */

import { type CellColor } from './Tetromino';

export type GameKey = 'Left' | 'Right' | 'Down' | 'Up';

export interface CellStyle {
  fill: CellColor;
  outline: CellColor;
}

export interface CaptionStyle {
  fontSize: number;
  color: CellColor;
}

export interface DrawSurface {
  /** Removes everything drawn so far. */
  clear(): void;
  /** Fills the rectangle spanning (x1, y1)-(x2, y2) in pixels. */
  fillRect(x1: number, y1: number, x2: number, y2: number, style: CellStyle): void;
  /** Draws `text` centred on (x, y). */
  drawText(x: number, y: number, text: string, style: CaptionStyle): void;
}

export interface ScoreLabel {
  setText(text: string): void;
}

/**
 * Runs a callback once after a delay. Not a fixed-rate timer: each tick
 * schedules the next, so the cadence drifts under load.
 */
export interface TickScheduler {
  schedule(delayMs: number, callback: () => void): void;
}

export interface KeyHandler {
  handleKeyDown(key: GameKey): void;
  handleKeyUp(key: GameKey): void;
}

export interface GameSurface {
  canvas: DrawSurface;
  scoreLabel: ScoreLabel;
  scheduler: TickScheduler;
}

// ---------------------------------------------------------------------------
// setTimeout-backed scheduler
// ---------------------------------------------------------------------------

export class TimeoutScheduler implements TickScheduler {
  private pending: ReturnType<typeof setTimeout> | null = null;

  schedule(delayMs: number, callback: () => void): void {
    this.pending = setTimeout(() => {
      this.pending = null;
      callback();
    }, delayMs);
  }

  /** Drops a tick that has been scheduled but has not fired yet. */
  cancel(): void {
    if (this.pending !== null) {
      clearTimeout(this.pending);
      this.pending = null;
    }
  }
}
