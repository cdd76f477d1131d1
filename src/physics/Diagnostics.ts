import { DEFAULT_GRAVITY, type PointMass } from './Gravity.js';
import type { GravityParameters } from './SimulationParameters.js';
import { Vector2 } from './Vector2.js';

export interface MovingMass extends PointMass {
  readonly velocity: Vector2;
}

export interface DiagnosticsReport {
  kineticEnergy: number;
  potentialEnergy: number;
  totalEnergy: number;
  momentum: Vector2;
  angularMomentum: number;
  centerOfMass: Vector2;
}

// Conservation quantities for a set of bodies. Used by tests and the debug HUD
// to check the integrator, never by the step itself.
export class Diagnostics {
  static kineticEnergy(bodies: readonly MovingMass[]): number {
    return bodies.reduce((sum, b) => sum + 0.5 * b.mass * b.velocity.magnitudeSquared(), 0);
  }

  /**
   * Pairwise -G·mi·mj/r with r floored at the softening distance, matching the
   * force law outside that radius.
   */
  static potentialEnergy(bodies: readonly PointMass[], params: GravityParameters = DEFAULT_GRAVITY): number {
    let energy = 0;
    for (let i = 0; i < bodies.length; i++) {
      for (let j = i + 1; j < bodies.length; j++) {
        const r = Math.max(bodies[i].position.distanceTo(bodies[j].position), params.softening);
        energy -= (params.gravitationalConstant * bodies[i].mass * bodies[j].mass) / r;
      }
    }
    return energy;
  }

  static totalEnergy(bodies: readonly MovingMass[], params: GravityParameters = DEFAULT_GRAVITY): number {
    return Diagnostics.kineticEnergy(bodies) + Diagnostics.potentialEnergy(bodies, params);
  }

  static totalMomentum(bodies: readonly MovingMass[]): Vector2 {
    return bodies.reduce((sum, b) => sum.add(b.velocity.multiply(b.mass)), Vector2.zero());
  }

  // About the origin; z component only, since everything lives in the plane.
  static angularMomentum(bodies: readonly MovingMass[]): number {
    return bodies.reduce((sum, b) => sum + b.mass * b.position.cross(b.velocity), 0);
  }

  static centerOfMass(bodies: readonly PointMass[]): Vector2 {
    const totalMass = bodies.reduce((sum, b) => sum + b.mass, 0);
    if (totalMass === 0) return Vector2.zero();
    const weighted = bodies.reduce((sum, b) => sum.add(b.position.multiply(b.mass)), Vector2.zero());
    return weighted.divide(totalMass);
  }

  /** |current - initial| / |initial|; absolute difference when initial is 0. */
  static relativeDrift(initial: number, current: number): number {
    const delta = Math.abs(current - initial);
    return initial === 0 ? delta : delta / Math.abs(initial);
  }

  static report(bodies: readonly MovingMass[], params: GravityParameters = DEFAULT_GRAVITY): DiagnosticsReport {
    const kineticEnergy = Diagnostics.kineticEnergy(bodies);
    const potentialEnergy = Diagnostics.potentialEnergy(bodies, params);
    return {
      kineticEnergy,
      potentialEnergy,
      totalEnergy: kineticEnergy + potentialEnergy,
      momentum: Diagnostics.totalMomentum(bodies),
      angularMomentum: Diagnostics.angularMomentum(bodies),
      centerOfMass: Diagnostics.centerOfMass(bodies),
    };
  }
}
