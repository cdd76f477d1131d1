import { ConfigurationError } from './errors.js';
import { type TrailPolicy, UNBOUNDED_TRAIL, validateTrailPolicy } from './Trail.js';

export interface SimulationOverrides {
  gravitationalConstant?: number;
  softening?: number;
  timeStep?: number;
  speedFactor?: number;
  maxStepsPerFrame?: number;
  trail?: Partial<TrailPolicy>;
}

export interface GravityParameters {
  gravitationalConstant: number;
  softening: number;
}

// Tunables for the simulation. Units are internal to the simulation, not SI.
export class SimulationParameters implements GravityParameters {
  public readonly gravitationalConstant: number = 1.0;
  public readonly softening: number = 0.1; // minimum pair distance used in 1/r²
  public readonly timeStep: number = 0.01; // fixed dt per step
  public readonly speedFactor: number = 500; // simulation time per wall-clock second
  public readonly maxStepsPerFrame: number = Number.POSITIVE_INFINITY;
  public readonly trail: Readonly<TrailPolicy>;

  constructor(overrides: SimulationOverrides = {}) {
    this.gravitationalConstant = positive(
      overrides.gravitationalConstant ?? this.gravitationalConstant,
      'gravitationalConstant'
    );
    this.softening = positive(overrides.softening ?? this.softening, 'softening');
    this.timeStep = positive(overrides.timeStep ?? this.timeStep, 'timeStep');
    this.speedFactor = positive(overrides.speedFactor ?? this.speedFactor, 'speedFactor');

    const maxSteps = overrides.maxStepsPerFrame ?? this.maxStepsPerFrame;
    if (maxSteps !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxSteps) || maxSteps < 1)) {
      throw new ConfigurationError(`must be a positive integer or Infinity, got ${maxSteps}`, 'maxStepsPerFrame');
    }
    this.maxStepsPerFrame = maxSteps;

    this.trail = Object.freeze(validateTrailPolicy({ ...UNBOUNDED_TRAIL, ...overrides.trail }));
  }
}

function positive(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`must be a positive finite number, got ${value}`, field);
  }
  return value;
}
