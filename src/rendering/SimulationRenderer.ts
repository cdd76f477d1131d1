import type { BodyView } from '../physics/Body.js';
import { Vector2 } from '../physics/Vector2.js';
import type { BodyPalette } from './BodyPalette.js';
import type { CanvasRenderer } from './CanvasRenderer.js';

export interface HudInfo {
  stepCount: number;
  elapsedTime: number;
  energyDrift: number;
}

const BACKGROUND = '#ffffff';

// Draws one frame: trails underneath, bodies on top, optional debug line.
export class SimulationRenderer {
  constructor(
    private readonly canvas: CanvasRenderer,
    private readonly palette: BodyPalette
  ) {}

  render(bodies: ReadonlyArray<BodyView>, hud?: HudInfo): void {
    this.canvas.fill(BACKGROUND);
    this.canvas.beginFrame();

    bodies.forEach((body, index) => {
      this.canvas.drawPolyline(body.trail, this.palette.visualFor(index).color, 1);
    });
    bodies.forEach((body, index) => {
      const visual = this.palette.visualFor(index);
      this.canvas.drawCircle(body.position, visual.radius, visual.color);
    });

    this.canvas.endFrame();

    if (hud) {
      this.canvas.drawText(formatHud(hud), new Vector2(10, 20));
    }
  }
}

export function formatHud(hud: HudInfo): string {
  return `steps ${hud.stepCount}  t ${hud.elapsedTime.toFixed(2)}  dE ${(hud.energyDrift * 100).toFixed(4)}%`;
}
