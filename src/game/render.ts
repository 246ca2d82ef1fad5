import * as PIXI from 'pixi.js';
import { GameSnapshot } from '../types';
import { WORLD } from '../constants/balance';
import { Effects } from './particles';
import { buildScene } from './scene';
import { farewellLines, hudLine, overlayLines } from './hud';

export interface FrameView {
  soundOn: boolean;
  shake: number;   // horizontal playfield offset in world px
}

const HUD_STYLE = { fontFamily: 'monospace', fontSize: 16, fill: 0xe0f7fa };
const OVERLAY_STYLE = { fontFamily: 'monospace', fontSize: 22, fill: 0xffffff, align: 'center' as const, lineHeight: 30 };

// Draws snapshots into a letterboxed WORLD-sized container on the stage.
// All entities are plain rects redrawn every frame into one Graphics.
export class PixiRenderer {
  private readonly world = new PIXI.Container();
  private readonly field = new PIXI.Container();
  private readonly shapes = new PIXI.Graphics();
  private readonly dim = new PIXI.Graphics();
  private readonly hud = new PIXI.Text({ text: '', style: HUD_STYLE });
  private readonly overlay = new PIXI.Text({ text: '', style: OVERLAY_STYLE });

  constructor(private readonly app: PIXI.Application) {
    const border = new PIXI.Graphics().rect(0, 0, WORLD.WIDTH, WORLD.HEIGHT).stroke({ color: 0x263238, width: 2 });
    this.dim.rect(0, 0, WORLD.WIDTH, WORLD.HEIGHT).fill({ color: 0x000000, alpha: 0.6 });
    this.hud.position.set(10, 8);
    this.overlay.anchor.set(0.5);
    this.overlay.position.set(WORLD.WIDTH / 2, WORLD.HEIGHT / 2);
    this.field.addChild(this.shapes);
    this.world.addChild(border, this.field, this.hud, this.dim, this.overlay);
    app.stage.addChild(this.world);
  }

  draw(snap: GameSnapshot, fx: Effects | null, view: FrameView) {
    this.fit();
    this.shapes.clear();
    if (snap.state !== 'menu') {
      for (const r of buildScene(snap, fx)) this.shapes.rect(r.x, r.y, r.w, r.h).fill({ color: r.color, alpha: r.alpha });
    }
    this.field.x = view.shake;
    this.hud.text = snap.state === 'menu' ? '' : hudLine(snap);
    this.showOverlay(overlayLines(snap, view.soundOn), snap.state !== 'playing');
  }

  farewell() {
    this.shapes.clear();
    this.hud.text = '';
    this.showOverlay(farewellLines(), true);
  }

  private showOverlay(lines: string[] | null, dimmed: boolean) {
    this.overlay.text = lines ? lines.join('\n') : '';
    this.dim.visible = dimmed && lines !== null;
  }

  // Uniform scale to the canvas, centred
  private fit() {
    const { width, height } = this.app.screen;
    const scale = Math.min(width / WORLD.WIDTH, height / WORLD.HEIGHT);
    this.world.scale.set(scale);
    this.world.position.set((width - WORLD.WIDTH * scale) / 2, (height - WORLD.HEIGHT * scale) / 2);
  }
}
