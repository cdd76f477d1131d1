import type { GravityParameters } from './SimulationParameters.js';
import { Vector2 } from './Vector2.js';

// Anything with a position and a mass can attract or be attracted.
export interface PointMass {
  readonly position: Vector2;
  readonly mass: number;
}

export const DEFAULT_GRAVITY: Readonly<GravityParameters> = Object.freeze({
  gravitationalConstant: 1.0,
  softening: 0.1,
});

/**
 * Acceleration that `source` gives `target`: G·m_source / d² along the line
 * between them, with d floored at the softening distance.
 */
export function pairwiseAcceleration(
  target: PointMass,
  source: PointMass,
  params: GravityParameters = DEFAULT_GRAVITY
): Vector2 {
  const diff = source.position.subtract(target.position);
  const distance = Math.max(diff.magnitude(), params.softening);
  return diff.normalized().multiply((params.gravitationalConstant * source.mass) / (distance * distance));
}

/**
 * Net gravitational acceleration on every body from all the others, in input
 * order. Pure: reads positions and masses, mutates nothing. O(N²).
 */
export function computeAccelerations(
  bodies: readonly PointMass[],
  params: GravityParameters = DEFAULT_GRAVITY
): Vector2[] {
  const accelerations: Vector2[] = [];
  for (let i = 0; i < bodies.length; i++) {
    let acc = Vector2.zero();
    for (let j = 0; j < bodies.length; j++) {
      if (i === j) continue;
      acc = acc.add(pairwiseAcceleration(bodies[i], bodies[j], params));
    }
    accelerations.push(acc);
  }
  return accelerations;
}
