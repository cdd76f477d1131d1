import { Trail, type TrailPolicy } from './Trail.js';
import type { Vector2 } from './Vector2.js';

// Read-only shape handed to anything outside the engine (renderer, HUD, tests).
export interface BodyView {
  readonly position: Vector2;
  readonly velocity: Vector2;
  readonly mass: number;
  readonly trail: readonly Vector2[];
}

// Point mass. Mass is fixed at construction; only the engine moves position and velocity.
export class Body {
  public position: Vector2;
  public velocity: Vector2;
  public readonly mass: number;
  public readonly trail: Trail;

  constructor(position: Vector2, velocity: Vector2, mass: number, trail: Trail | TrailPolicy = new Trail()) {
    this.position = position;
    this.velocity = velocity;
    this.mass = mass;
    this.trail = trail instanceof Trail ? trail : new Trail(trail);
  }

  toView(): BodyView {
    return {
      position: this.position,
      velocity: this.velocity,
      mass: this.mass,
      trail: this.trail.points(),
    };
  }

  clone(): Body {
    return new Body(this.position, this.velocity, this.mass, this.trail.clone());
  }
}
