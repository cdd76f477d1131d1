import type { BodySpec } from '../core/Scenario.js';

// Visual identity of a body, kept apart from its physics state and joined by index.
export interface BodyVisual {
  color: string;
  radius: number;
}

export const DEFAULT_COLORS: readonly string[] = ['#ff0000', '#00ff00', '#0000ff', '#ff9900', '#9900ff', '#00cccc'];
export const DEFAULT_BODY_RADIUS = 5;

export class BodyPalette {
  private readonly visuals: BodyVisual[];

  constructor(visuals: BodyVisual[]) {
    this.visuals = visuals;
  }

  // Scenario colours where given, otherwise cycle through the defaults
  static fromSpecs(specs: readonly BodySpec[]): BodyPalette {
    return new BodyPalette(
      specs.map((spec, index) => ({
        color: spec.color ?? DEFAULT_COLORS[index % DEFAULT_COLORS.length],
        radius: DEFAULT_BODY_RADIUS,
      }))
    );
  }

  get size(): number {
    return this.visuals.length;
  }

  visualFor(index: number): BodyVisual {
    return (
      this.visuals[index] ?? {
        color: DEFAULT_COLORS[index % DEFAULT_COLORS.length],
        radius: DEFAULT_BODY_RADIUS,
      }
    );
  }
}
