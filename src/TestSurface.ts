/**
 * In-process stand-ins for the browser surface, used by the Game tests.
 */

import { type RandomSource } from './Rng';
import {
  type CellStyle,
  type DrawSurface,
  type ScoreLabel,
  type CaptionStyle,
  type TickScheduler,
} from './Surface';

export interface DrawnRect extends CellStyle {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface DrawnText extends CaptionStyle {
  x: number;
  y: number;
  text: string;
}

/** Keeps whatever was drawn since the last clear. */
export class RecordingCanvas implements DrawSurface {
  rects: DrawnRect[] = [];
  texts: DrawnText[] = [];
  clears = 0;

  clear(): void {
    this.rects = [];
    this.texts = [];
    this.clears++;
  }

  fillRect(x1: number, y1: number, x2: number, y2: number, style: CellStyle): void {
    this.rects.push({ x1, y1, x2, y2, ...style });
  }

  drawText(x: number, y: number, text: string, style: CaptionStyle): void {
    this.texts.push({ x, y, text, ...style });
  }
}

export class RecordingLabel implements ScoreLabel {
  text = '';

  setText(text: string): void {
    this.text = text;
  }
}

/** Queues callbacks instead of running them; tests fire them one at a time. */
export class ManualScheduler implements TickScheduler {
  pending: { delayMs: number; callback: () => void }[] = [];

  schedule(delayMs: number, callback: () => void): void {
    this.pending.push({ delayMs, callback });
  }

  runNext(): boolean {
    const next = this.pending.shift();
    if (!next) return false;
    next.callback();
    return true;
  }
}

/** Replays a fixed list of values (modulo n), cycling when it runs out. */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {}

  nextInt(n: number): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value % n;
  }
}
