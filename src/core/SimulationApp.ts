import { Diagnostics } from '../physics/Diagnostics.js';
import { SimulationParameters, type SimulationOverrides } from '../physics/SimulationParameters.js';
import { BodyPalette } from '../rendering/BodyPalette.js';
import { CanvasRenderer } from '../rendering/CanvasRenderer.js';
import { type HudInfo, SimulationRenderer } from '../rendering/SimulationRenderer.js';
import { FixedStepDriver } from './FixedStepDriver.js';
import { NBodySimulation } from './NBodySimulation.js';
import { type Scenario, THREE_BODY_SCENARIO } from './Scenario.js';

export interface SimulationAppOptions {
  scenario?: Scenario;
  overrides?: SimulationOverrides;
  debug?: boolean;
}

// Browser shell: animation frame loop feeding the fixed-step driver and the renderer.
export class SimulationApp {
  private readonly simulation: NBodySimulation;
  private readonly driver: FixedStepDriver;
  private readonly canvasRenderer: CanvasRenderer;
  private readonly renderer: SimulationRenderer;
  private readonly debugEnabled: boolean;
  private readonly initialEnergy: number;

  private isRunning = false;
  private lastTime = 0;
  private animationFrameId = 0;

  constructor(canvas: HTMLCanvasElement, options: SimulationAppOptions = {}) {
    const scenario = options.scenario ?? THREE_BODY_SCENARIO;
    const params = new SimulationParameters(options.overrides);
    this.debugEnabled = options.debug ?? false;

    this.simulation = NBodySimulation.fromSpecs(scenario.bodies, params);
    this.driver = new FixedStepDriver(this.simulation, {
      speedFactor: params.speedFactor,
      maxStepsPerFrame: params.maxStepsPerFrame,
      debugLog: (...args) => this.debugLog(...args),
    });
    this.canvasRenderer = new CanvasRenderer(canvas);
    this.renderer = new SimulationRenderer(this.canvasRenderer, BodyPalette.fromSpecs(scenario.bodies));
    this.initialEnergy = this.simulation.getDiagnostics().totalEnergy;

    this.debugLog(`Loaded "${scenario.name}" with ${scenario.bodies.length} bodies, dt=${params.timeStep}`);
  }

  // prints only when debug is enabled
  private debugLog(...args: unknown[]): void {
    if (this.debugEnabled) console.log(...args);
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.lastTime = performance.now();
    window.addEventListener('resize', this.handleResize);
    this.loop();
  }

  stop(): void {
    this.isRunning = false;
    window.removeEventListener('resize', this.handleResize);
    if (this.animationFrameId) {
      window.cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = 0;
    }
  }

  getSimulation(): NBodySimulation {
    return this.simulation;
  }

  /**
   * One frame: convert elapsed wall time into steps, then draw.
   * @param deltaSeconds Wall-clock time since the previous frame
   */
  frame(deltaSeconds: number): number {
    const steps = this.driver.advance(deltaSeconds);
    this.renderer.render(this.simulation.getBodies(), this.debugEnabled ? this.hudInfo() : undefined);
    return steps;
  }

  private loop(): void {
    if (!this.isRunning) return;

    const currentTime = performance.now();
    const deltaTime = (currentTime - this.lastTime) / 1000;
    this.lastTime = currentTime;

    this.frame(deltaTime);

    this.animationFrameId = window.requestAnimationFrame(() => this.loop());
  }

  private hudInfo(): HudInfo {
    return {
      stepCount: this.simulation.getStepCount(),
      elapsedTime: this.simulation.getElapsedTime(),
      energyDrift: Diagnostics.relativeDrift(this.initialEnergy, this.simulation.getDiagnostics().totalEnergy),
    };
  }

  private readonly handleResize = (): void => {
    this.canvasRenderer.handleResize();
  };
}
