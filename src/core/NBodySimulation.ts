import type { Body, BodyView } from '../physics/Body.js';
import { Diagnostics, type DiagnosticsReport } from '../physics/Diagnostics.js';
import { SimulationParameters } from '../physics/SimulationParameters.js';
import { VerletIntegrator } from '../physics/VerletIntegrator.js';
import { type BodySpec, createBodies, THREE_BODY_SCENARIO } from './Scenario.js';

/**
 * The simulation engine. Sole owner of the body list; knows the fixed step and
 * nothing about wall-clock time or drawing.
 */
export class NBodySimulation {
  private readonly bodies: Body[];
  private readonly integrator: VerletIntegrator;
  private stepCount = 0;

  constructor(
    bodies: Body[],
    public readonly params: SimulationParameters = new SimulationParameters()
  ) {
    this.bodies = [...bodies];
    this.integrator = new VerletIntegrator(params);
  }

  static fromSpecs(
    specs: readonly BodySpec[] = THREE_BODY_SCENARIO.bodies,
    params: SimulationParameters = new SimulationParameters()
  ): NBodySimulation {
    return new NBodySimulation(createBodies(specs, params.trail), params);
  }

  get dt(): number {
    return this.params.timeStep;
  }

  /** Advance all bodies by exactly one fixed dt. */
  step(): void {
    this.integrator.step(this.bodies, this.params.timeStep);
    this.stepCount++;
  }

  stepMany(count: number): void {
    for (let i = 0; i < count; i++) this.step();
  }

  getBodies(): ReadonlyArray<BodyView> {
    return this.bodies.map((body) => body.toView());
  }

  getStepCount(): number {
    return this.stepCount;
  }

  // Simulation time units elapsed since construction
  getElapsedTime(): number {
    return this.stepCount * this.params.timeStep;
  }

  getDiagnostics(): DiagnosticsReport {
    return Diagnostics.report(this.bodies, this.params);
  }

  // Independent copy: same state, separate bodies and trails
  clone(): NBodySimulation {
    const copy = new NBodySimulation(
      this.bodies.map((body) => body.clone()),
      this.params
    );
    copy.stepCount = this.stepCount;
    return copy;
  }
}
