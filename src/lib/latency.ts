/**
 * Latency models: how far in the future an accepted intent or a fill lands
 * on the event queue.
 */

import type { SeededRNG } from "./rng";

export interface LatencyModel {
  /** Delay from intent submission to the ORDER/CANCEL event. */
  submissionDelay(): number;
  /** Delay from processing an ORDER/CANCEL to its acknowledgement. */
  ackDelay(): number;
  /** Delay from a match to the FILL event reaching the ledger. */
  fillDelay(): number;
}

export class ConstantLatency implements LatencyModel {
  constructor(
    private readonly submissionMs = 0,
    private readonly fillMs = 0,
    private readonly ackMs = 0
  ) {}

  submissionDelay(): number {
    return this.submissionMs;
  }

  ackDelay(): number {
    return this.ackMs;
  }

  fillDelay(): number {
    return this.fillMs;
  }
}

/**
 * Base delays plus a uniform integer jitter in [0, jitterMs], drawn from the
 * run's "latency" stream. Each call takes one draw.
 */
export class JitteredLatency implements LatencyModel {
  constructor(
    private readonly rng: SeededRNG,
    private readonly submissionMs: number,
    private readonly fillMs: number,
    private readonly jitterMs: number,
    private readonly ackMs = 0
  ) {}

  submissionDelay(): number {
    return this.submissionMs + this.rng.randomRange(0, this.jitterMs);
  }

  ackDelay(): number {
    return this.ackMs + this.rng.randomRange(0, this.jitterMs);
  }

  fillDelay(): number {
    return this.fillMs + this.rng.randomRange(0, this.jitterMs);
  }
}
