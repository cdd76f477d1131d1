import { ConfigurationError } from '@/physics/errors';
import { SimulationParameters } from '@/physics/SimulationParameters';
import { describe, expect, it } from 'vitest';

describe('SimulationParameters', () => {
  it('defaults', () => {
    const params = new SimulationParameters();
    expect(params.gravitationalConstant).toBe(1);
    expect(params.softening).toBe(0.1);
    expect(params.timeStep).toBe(0.01);
    expect(params.speedFactor).toBe(500);
    expect(params.maxStepsPerFrame).toBe(Number.POSITIVE_INFINITY);
    expect(params.trail).toEqual({ maxPoints: Number.POSITIVE_INFINITY, sampleEvery: 1 });
  });

  it('applies overrides, merging partial trail policy', () => {
    const params = new SimulationParameters({ speedFactor: 100, softening: 0.5, trail: { maxPoints: 4000 } });
    expect(params.speedFactor).toBe(100);
    expect(params.softening).toBe(0.5);
    expect(params.timeStep).toBe(0.01);
    expect(params.trail).toEqual({ maxPoints: 4000, sampleEvery: 1 });
  });

  it('rejects non-positive or non-finite values', () => {
    expect(() => new SimulationParameters({ timeStep: 0 })).toThrow(ConfigurationError);
    expect(() => new SimulationParameters({ softening: -1 })).toThrow('softening');
    expect(() => new SimulationParameters({ gravitationalConstant: Number.NaN })).toThrow('gravitationalConstant');
    expect(() => new SimulationParameters({ maxStepsPerFrame: 0 })).toThrow('maxStepsPerFrame');
    expect(() => new SimulationParameters({ trail: { sampleEvery: 0 } })).toThrow('trail.sampleEvery');
  });

  it('error messages name the field', () => {
    const attempt = (): SimulationParameters => new SimulationParameters({ speedFactor: -5 });
    expect(attempt).toThrow(
      expect.objectContaining({
        name: 'ConfigurationError',
        field: 'speedFactor',
        message: 'speedFactor: must be a positive finite number, got -5',
      })
    );
  });
});
