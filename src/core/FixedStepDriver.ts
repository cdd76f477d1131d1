export interface Steppable {
  readonly dt: number;
  step(): void;
}

export interface FixedStepDriverOptions {
  speedFactor?: number;
  maxStepsPerFrame?: number;
  debugLog?: (...args: unknown[]) => void;
}

// Turns wall-clock frame time into whole fixed steps. A slow frame runs several
// steps to catch up, a fast one may run none; the leftover waits in the accumulator.
export class FixedStepDriver {
  private accumulator = 0;
  private readonly speedFactor: number;
  private readonly maxStepsPerFrame: number;
  private readonly debugLog: (...args: unknown[]) => void;

  constructor(
    private readonly target: Steppable,
    options: FixedStepDriverOptions = {}
  ) {
    this.speedFactor = options.speedFactor ?? 500;
    this.maxStepsPerFrame = options.maxStepsPerFrame ?? Number.POSITIVE_INFINITY;
    this.debugLog = options.debugLog ?? (() => {});
  }

  /**
   * @param wallClockSeconds Real time since the previous frame
   * @returns Number of steps taken
   */
  advance(wallClockSeconds: number): number {
    if (!Number.isFinite(wallClockSeconds) || wallClockSeconds <= 0) return 0;
    this.accumulator += wallClockSeconds * this.speedFactor;

    const dt = this.target.dt;
    let steps = 0;
    while (this.accumulator >= dt && steps < this.maxStepsPerFrame) {
      this.target.step();
      this.accumulator -= dt;
      steps++;
    }

    // Out of budget: drop the backlog instead of carrying it into the next frame
    if (this.accumulator >= dt) {
      this.debugLog(`Step budget of ${this.maxStepsPerFrame} reached, dropping ${this.accumulator.toFixed(3)} time units`);
      this.accumulator = 0;
    }
    return steps;
  }

  getAccumulator(): number {
    return this.accumulator;
  }

  reset(): void {
    this.accumulator = 0;
  }
}
