import { Body } from '../physics/Body.js';
import { ConfigurationError } from '../physics/errors.js';
import { Trail, type TrailPolicy, UNBOUNDED_TRAIL } from '../physics/Trail.js';
import { Vector2 } from '../physics/Vector2.js';

export interface PointSpec {
  x: number;
  y: number;
}

// One initial condition. Colour is for the renderer only and never reaches the Body.
export interface BodySpec {
  mass: number;
  position: PointSpec;
  velocity: PointSpec;
  color?: string;
}

export interface Scenario {
  name: string;
  bodies: BodySpec[];
}

export const THREE_BODY_SCENARIO: Readonly<Scenario> = Object.freeze({
  name: 'Three-Body Simulation',
  bodies: [
    { mass: 70, position: { x: -100, y: 0 }, velocity: { x: 0, y: 0.5 }, color: '#ff0000' },
    { mass: 100, position: { x: 0, y: 0 }, velocity: { x: 0, y: 0 }, color: '#00ff00' },
    { mass: 30, position: { x: 100, y: 0 }, velocity: { x: 0, y: -0.5 }, color: '#0000ff' },
  ],
});

/**
 * Turn initial conditions into bodies. This is where "finite numbers, mass > 0"
 * is enforced; the engine trusts the result from then on.
 */
export function createBodies(specs: readonly BodySpec[], trailPolicy: TrailPolicy = UNBOUNDED_TRAIL): Body[] {
  if (specs.length === 0) {
    throw new ConfigurationError('at least one body is required', 'bodies');
  }
  return specs.map((spec, index) => {
    const field = `bodies[${index}]`;
    if (!Number.isFinite(spec.mass) || spec.mass <= 0) {
      throw new ConfigurationError(`mass must be a positive finite number, got ${spec.mass}`, field);
    }
    const position = toVector(spec.position, `${field}.position`);
    const velocity = toVector(spec.velocity, `${field}.velocity`);
    return new Body(position, velocity, spec.mass, new Trail(trailPolicy));
  });
}

function toVector(point: PointSpec, field: string): Vector2 {
  const v = Vector2.from(point);
  if (!v.isFinite()) {
    throw new ConfigurationError(`must have finite x and y, got ${v.x}, ${v.y}`, field);
  }
  return v;
}
