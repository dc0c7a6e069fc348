/**
 * main.ts: application entry point.
 *
 * 1. Builds the config from defaults and the page's query string.
 * 2. Creates the PixiJS Application and mounts the canvas.
 * 3. Instantiates Renderer, Ui and Game, binds the keyboard and starts ticking.
 */

import { Application } from 'pixi.js';
import { canvasSize, configFromQuery, createConfig } from './Config';
import { Game, formatGameOverTitle } from './Game';
import { Renderer } from './Renderer';
import { TimeoutScheduler } from './Surface';
import { Ui } from './Ui';

async function main(): Promise<void> {
  const config = createConfig(configFromQuery(window.location.search));
  const { width, height } = canvasSize(config);
  document.title = config.title;

  // -------------------------------------------------------------------------
  // PixiJS initialisation
  // -------------------------------------------------------------------------
  const app = new Application();

  await app.init({
    width,
    height,
    backgroundColor: 0xffffff,
    antialias:       false, // pixel-perfect grid looks better without AA
    resolution:      window.devicePixelRatio || 1,
    autoDensity:     true,
  });

  const container = document.getElementById('canvas-container');
  if (!container) throw new Error('Missing #canvas-container element');
  container.appendChild(app.canvas);

  // -------------------------------------------------------------------------
  // Game subsystems
  // -------------------------------------------------------------------------
  const renderer  = new Renderer(app);
  const ui        = new Ui(document);
  const scheduler = new TimeoutScheduler();
  const game      = new Game(config, { canvas: renderer, scoreLabel: ui, scheduler });

  game.onGameOver = score => {
    document.title = formatGameOverTitle(config.title, score);
  };

  ui.bind(game);
  game.start();

  window.addEventListener('beforeunload', () => {
    scheduler.cancel();
    ui.destroy();
  });
}

main().catch(err => {
  console.error('[Tetris] Fatal error:', err);
});
