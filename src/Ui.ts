/**
 * Ui: manages the HTML-side DOM interactions.
 *
 * The PixiJS canvas handles only the board. The score label lives in HTML and
 * is updated through the ScoreLabel contract; keyboard events on the document
 * are translated to GameKeys and forwarded to whatever KeyHandler is bound.
 */

import { type GameKey, type KeyHandler, type ScoreLabel } from './Surface';

const KEY_MAP: Readonly<Record<string, GameKey>> = {
  ArrowLeft:  'Left',
  ArrowRight: 'Right',
  ArrowDown:  'Down',
  ArrowUp:    'Up',
};

/** Maps a DOM `KeyboardEvent.key` to a GameKey, or null for keys the game ignores. */
export function toGameKey(key: string): GameKey | null {
  return Object.prototype.hasOwnProperty.call(KEY_MAP, key) ? KEY_MAP[key] : null;
}

export class Ui implements ScoreLabel {
  private doc: Document;
  private elScore: HTMLElement;

  /** Removes the listeners installed by the last `bind()`. */
  private unbind: (() => void) | null = null;

  constructor(doc: Document = document) {
    this.doc = doc;
    this.elScore = this.must('score');
  }

  setText(text: string): void {
    this.elScore.textContent = text;
  }

  // ---------------------------------------------------------------------------
  // Binding
  // ---------------------------------------------------------------------------

  bind(handler: KeyHandler): void {
    this.destroy();

    const onKeyDown = (e: KeyboardEvent): void => {
      const key = toGameKey(e.key);
      if (key === null) return;
      // Arrow keys would otherwise scroll the page
      e.preventDefault();
      handler.handleKeyDown(key);
    };
    const onKeyUp = (e: KeyboardEvent): void => {
      const key = toGameKey(e.key);
      if (key !== null) handler.handleKeyUp(key);
    };
    // A key released while the window is unfocused never reports key-up
    const onBlur = (): void => handler.handleKeyUp('Down');

    const win = this.doc.defaultView;
    this.doc.addEventListener('keydown', onKeyDown);
    this.doc.addEventListener('keyup', onKeyUp);
    win?.addEventListener('blur', onBlur);

    this.unbind = () => {
      this.doc.removeEventListener('keydown', onKeyDown);
      this.doc.removeEventListener('keyup', onKeyUp);
      win?.removeEventListener('blur', onBlur);
    };
  }

  destroy(): void {
    this.unbind?.();
    this.unbind = null;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private must(id: string): HTMLElement {
    const el = this.doc.getElementById(id);
    if (!el) throw new Error(`[Ui] Element #${id} not found`);
    return el;
  }
}
