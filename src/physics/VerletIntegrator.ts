import type { Body } from './Body.js';
import { computeAccelerations, DEFAULT_GRAVITY } from './Gravity.js';
import type { GravityParameters } from './SimulationParameters.js';

// Velocity Verlet for mutual gravity. Symplectic, so orbits hold their energy
// over long runs where explicit Euler would spiral in or out.
export class VerletIntegrator {
  constructor(private readonly params: GravityParameters = DEFAULT_GRAVITY) {}

  /**
   * Advance every body by one fixed step, in place.
   *
   * All positions are moved before accelerations are recomputed, so no body
   * sees another body half-way through the step. Each body's trail receives
   * the new position exactly once.
   */
  step(bodies: Body[], dt: number): void {
    const accOld = computeAccelerations(bodies, this.params);
    const halfDtSquared = 0.5 * dt * dt;

    // x(t+dt) = x(t) + v(t)·dt + ½·a(t)·dt²
    for (let i = 0; i < bodies.length; i++) {
      const body = bodies[i];
      body.position = body.position.add(body.velocity.multiply(dt)).add(accOld[i].multiply(halfDtSquared));
    }

    const accNew = computeAccelerations(bodies, this.params);

    // v(t+dt) = v(t) + ½·(a(t) + a(t+dt))·dt
    for (let i = 0; i < bodies.length; i++) {
      const body = bodies[i];
      body.velocity = body.velocity.add(accOld[i].add(accNew[i]).multiply(0.5 * dt));
      body.trail.push(body.position);
    }
  }
}
