import { ConfigurationError } from './errors.js';
import type { Vector2 } from './Vector2.js';

export interface TrailPolicy {
  /** Oldest points are dropped once this many are stored. Infinity keeps everything. */
  maxPoints: number;
  /** Record one point out of every `sampleEvery` offered. */
  sampleEvery: number;
}

// Every step, forever: the history grows for the life of the process.
export const UNBOUNDED_TRAIL: Readonly<TrailPolicy> = Object.freeze({
  maxPoints: Number.POSITIVE_INFINITY,
  sampleEvery: 1,
});

export function validateTrailPolicy(policy: TrailPolicy): TrailPolicy {
  const { maxPoints, sampleEvery } = policy;
  if (maxPoints !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxPoints) || maxPoints < 2)) {
    throw new ConfigurationError(`must be an integer >= 2 or Infinity, got ${maxPoints}`, 'trail.maxPoints');
  }
  if (!Number.isInteger(sampleEvery) || sampleEvery < 1) {
    throw new ConfigurationError(`must be a positive integer, got ${sampleEvery}`, 'trail.sampleEvery');
  }
  return { maxPoints, sampleEvery };
}

/**
 * Position history of one body, used only for drawing.
 *
 * With a finite `maxPoints` the storage is a ring buffer, so a long run keeps
 * constant memory. `points()` always returns oldest first.
 */
export class Trail {
  private readonly policy: TrailPolicy;
  private buffer: Vector2[] = [];
  private head = 0; // index of the oldest point once the ring is full
  private offered = 0;

  constructor(policy: TrailPolicy = UNBOUNDED_TRAIL) {
    this.policy = validateTrailPolicy(policy);
  }

  get length(): number {
    return this.buffer.length;
  }

  push(point: Vector2): void {
    const index = this.offered++;
    if (index % this.policy.sampleEvery !== 0) return;

    if (this.buffer.length < this.policy.maxPoints) {
      this.buffer.push(point);
      return;
    }
    this.buffer[this.head] = point;
    this.head = (this.head + 1) % this.buffer.length;
  }

  points(): Vector2[] {
    if (this.head === 0) return this.buffer.slice();
    return this.buffer.slice(this.head).concat(this.buffer.slice(0, this.head));
  }

  clone(): Trail {
    const copy = new Trail(this.policy);
    copy.buffer = this.buffer.slice();
    copy.head = this.head;
    copy.offered = this.offered;
    return copy;
  }
}
