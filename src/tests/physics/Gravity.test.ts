import { computeAccelerations, pairwiseAcceleration, type PointMass } from '@/physics/Gravity';
import { Vector2 } from '@/physics/Vector2';
import { describe, expect, it } from 'vitest';

const G = 1.0;
const SOFTENING = 0.1;
const params = { gravitationalConstant: G, softening: SOFTENING };

function mass(x: number, y: number, m: number): PointMass {
  return { position: new Vector2(x, y), mass: m };
}

describe('Gravity', () => {
  it('pulls a body towards the source with G·m/d²', () => {
    const acc = pairwiseAcceleration(mass(0, 0, 1), mass(10, 0, 100), params);
    expect(acc.x).toBeCloseTo(1, 12); // 100 / 10²
    expect(acc.y).toBe(0);
  });

  it('pairwise forces are equal and opposite (Newton III)', () => {
    const a = mass(-3, 7, 70);
    const b = mass(12, -4, 30);
    const onA = pairwiseAcceleration(a, b, params);
    const onB = pairwiseAcceleration(b, a, params);
    const forceOnA = onA.multiply(a.mass);
    const forceOnB = onB.multiply(b.mass);
    expect(forceOnA.magnitude()).toBeCloseTo(forceOnB.magnitude(), 12);
    expect(forceOnA.add(forceOnB).magnitude()).toBeLessThan(1e-12);
  });

  it('total force over all bodies sums to zero', () => {
    const bodies = [mass(-100, 0, 70), mass(0, 0, 100), mass(100, 0, 30), mass(5, 40, 12)];
    const acc = computeAccelerations(bodies, params);
    const net = acc.reduce((sum, a, i) => sum.add(a.multiply(bodies[i].mass)), Vector2.zero());
    expect(net.magnitude()).toBeLessThan(1e-12);
  });

  it('a lone body feels nothing (no self-interaction)', () => {
    const acc = computeAccelerations([mass(4, 4, 1000)], params);
    expect(acc).toEqual([Vector2.zero()]);
  });

  it('returns one acceleration per body, in input order', () => {
    const acc = computeAccelerations([mass(-10, 0, 100), mass(10, 0, 100), mass(0, 30, 1)], params);
    expect(acc).toHaveLength(3);
    expect(acc[0].x).toBeGreaterThan(0);
    expect(acc[1].x).toBeLessThan(0);
    expect(acc[2].y).toBeLessThan(0);
  });

  it('does not mutate the bodies', () => {
    const bodies = [mass(-10, 0, 100), mass(10, 0, 100)];
    computeAccelerations(bodies, params);
    expect(bodies[0].position).toEqual(new Vector2(-10, 0));
    expect(bodies[1].position).toEqual(new Vector2(10, 0));
  });

  it('floors the distance at the softening length', () => {
    const acc = pairwiseAcceleration(mass(0, 0, 1), mass(0.05, 0, 100), params);
    // 100 / 0.1² rather than 100 / 0.05²
    expect(acc.x).toBeCloseTo(10_000, 6);
    expect(acc.y).toBe(0);
  });

  it('coincident bodies give a finite acceleration bounded by G·m/softening²', () => {
    const acc = computeAccelerations([mass(1, 1, 100), mass(1, 1, 50)], params);
    for (const a of acc) {
      expect(a.isFinite()).toBe(true);
      expect(a.magnitude()).toBeLessThanOrEqual((G * 100) / (SOFTENING * SOFTENING));
    }
    // no direction to pull in, so the pair contributes nothing
    expect(acc[0]).toEqual(Vector2.zero());
  });

  it('scales with the gravitational constant', () => {
    const weak = pairwiseAcceleration(mass(0, 0, 1), mass(0, 5, 25), params);
    const strong = pairwiseAcceleration(mass(0, 0, 1), mass(0, 5, 25), { gravitationalConstant: 3, softening: 0.1 });
    expect(strong.y).toBeCloseTo(weak.y * 3, 12);
  });
});
