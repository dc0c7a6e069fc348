/**
 * Renderer: all PixiJS drawing lives here.
 *
 * Implements DrawSurface on top of a pixi Application: rectangles go into a
 * single Graphics object, text into a layer of Text nodes. `clear()` empties
 * both, so the Game can repaint the whole board every tick, which is fast
 * enough for a 10×20 grid.
 */

import { Application, Container, Graphics, Text, TextStyle } from 'pixi.js';
import { type CellStyle, type DrawSurface, type CaptionStyle } from './Surface';
import { COLOR_HEX } from './Tetromino';

const OUTLINE_WIDTH = 1;
const FONT_FAMILY = 'Helvetica, Arial, sans-serif';

export class Renderer implements DrawSurface {
  private root: Container;
  private gfx: Graphics;
  private textLayer: Container;

  constructor(app: Application) {
    this.root = new Container();
    app.stage.addChild(this.root);

    this.gfx = new Graphics();
    this.root.addChild(this.gfx);

    // Text sits above the cells
    this.textLayer = new Container();
    this.root.addChild(this.textLayer);
  }

  clear(): void {
    this.gfx.clear();
    for (const child of this.textLayer.removeChildren()) {
      child.destroy();
    }
  }

  fillRect(x1: number, y1: number, x2: number, y2: number, style: CellStyle): void {
    this.gfx
      .rect(x1, y1, x2 - x1, y2 - y1)
      .fill(COLOR_HEX[style.fill])
      .stroke({ color: COLOR_HEX[style.outline], width: OUTLINE_WIDTH });
  }

  drawText(x: number, y: number, text: string, style: CaptionStyle): void {
    const node = new Text({
      text,
      style: new TextStyle({
        fontFamily: FONT_FAMILY,
        fontSize: style.fontSize,
        fill: COLOR_HEX[style.color],
        align: 'center',
      }),
    });
    node.anchor.set(0.5, 0.5);
    node.x = x;
    node.y = y;
    this.textLayer.addChild(node);
  }
}
