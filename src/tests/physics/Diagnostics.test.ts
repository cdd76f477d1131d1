import { Diagnostics } from '@/physics/Diagnostics';
import { Vector2 } from '@/physics/Vector2';
import { describe, expect, it } from 'vitest';

const params = { gravitationalConstant: 1.0, softening: 0.1 };

function moving(px: number, py: number, vx: number, vy: number, mass: number) {
  return { position: new Vector2(px, py), velocity: new Vector2(vx, vy), mass };
}

describe('Diagnostics', () => {
  it('kinetic energy is ½·m·v² summed', () => {
    const bodies = [moving(0, 0, 3, 4, 2), moving(1, 1, 0, 1, 10)];
    expect(Diagnostics.kineticEnergy(bodies)).toBe(25 + 5);
  });

  it('potential energy is -G·mi·mj/r over distinct pairs', () => {
    const bodies = [moving(0, 0, 0, 0, 10), moving(5, 0, 0, 0, 20), moving(0, 4, 0, 0, 1)];
    // pairs: (0,1) r=5, (0,2) r=4, (1,2) r=√41
    const expected = -(10 * 20) / 5 - (10 * 1) / 4 - (20 * 1) / Math.sqrt(41);
    expect(Diagnostics.potentialEnergy(bodies, params)).toBeCloseTo(expected, 12);
  });

  it('potential energy uses the softening floor for close pairs', () => {
    const bodies = [moving(0, 0, 0, 0, 2), moving(0.01, 0, 0, 0, 3)];
    expect(Diagnostics.potentialEnergy(bodies, params)).toBeCloseTo(-6 / 0.1, 9);
  });

  it('momentum, angular momentum and centre of mass', () => {
    const bodies = [moving(-100, 0, 0, 0.5, 70), moving(0, 0, 0, 0, 100), moving(100, 0, 0, -0.5, 30)];
    const momentum = Diagnostics.totalMomentum(bodies);
    expect(momentum.x).toBe(0);
    expect(momentum.y).toBeCloseTo(35 - 15, 12);
    // Lz = Σ m·(x·vy - y·vx)
    expect(Diagnostics.angularMomentum(bodies)).toBeCloseTo(70 * -100 * 0.5 + 30 * 100 * -0.5, 12);
    const com = Diagnostics.centerOfMass(bodies);
    expect(com.x).toBeCloseTo((-7000 + 3000) / 200, 12);
    expect(com.y).toBe(0);
  });

  it('centre of mass of nothing is the origin', () => {
    expect(Diagnostics.centerOfMass([])).toEqual(Vector2.zero());
  });

  it('relative drift', () => {
    expect(Diagnostics.relativeDrift(-200, -198)).toBeCloseTo(0.01, 12);
    expect(Diagnostics.relativeDrift(0, 0.5)).toBe(0.5);
  });

  it('report totals kinetic and potential energy', () => {
    const bodies = [moving(0, 0, 1, 0, 2), moving(10, 0, -1, 0, 2)];
    const report = Diagnostics.report(bodies, params);
    expect(report.kineticEnergy).toBe(2);
    expect(report.potentialEnergy).toBeCloseTo(-0.4, 12);
    expect(report.totalEnergy).toBeCloseTo(1.6, 12);
    expect(report.momentum).toEqual(new Vector2(0, 0));
    expect(report.centerOfMass).toEqual(new Vector2(5, 0));
  });
});
