/**
 * Random Stream Manager
 *
 * Every subsystem draws randomness from its own named stream. Each stream is
 * an independent generator seeded from (root seed, stream name), so draws on
 * one stream can never shift the sequence observed on another.
 *
 * Stream names in use: "latent", "mechanism", "latency", "agents.<id>".
 */

import { createHash } from "node:crypto";
import { ConfigurationError } from "./errors";

// ============================================================================
// Seeded Random Number Generator
// ============================================================================

/**
 * Mulberry32 generator over a 32-bit state.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Generate random integer in [0, max)
   */
  randomInt(max: number): number {
    return Math.floor(this.random() * max);
  }

  /**
   * Generate random integer in [min, max]
   */
  randomRange(min: number, max: number): number {
    return min + this.randomInt(max - min + 1);
  }

  randomFloat(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  randomChoice<T>(arr: readonly T[]): T {
    if (arr.length === 0) {
      throw new RangeError("randomChoice requires a non-empty array");
    }
    return arr[this.randomInt(arr.length)];
  }

  /**
   * Normally distributed draw (Box-Muller). Consumes two uniforms.
   */
  randomNormal(mean: number, stdDev: number): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    const z0 = Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2.0 * Math.PI * u2);
    return z0 * stdDev + mean;
  }

  randomExp(lambda: number): number {
    return -Math.log(1 - this.random()) / lambda;
  }
}

// ============================================================================
// Seed derivation
// ============================================================================

function assertSeed(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a non-negative safe integer, got ${value}`);
  }
}

function digest(material: string): Buffer {
  return createHash("sha256").update(material, "utf8").digest();
}

/**
 * Child seed for one Monte Carlo repetition. Pure function of its inputs.
 */
export function deriveRepetitionSeed(scenarioSeed: number, repetitionIndex: number): number {
  assertSeed(scenarioSeed, "scenarioSeed");
  assertSeed(repetitionIndex, "repetitionIndex");
  return digest(`${scenarioSeed}:repetition:${repetitionIndex}`).readUIntBE(0, 6);
}

export function repetitionSeeds(scenarioSeed: number, count: number): number[] {
  assertSeed(count, "count");
  return Array.from({ length: count }, (_, i) => deriveRepetitionSeed(scenarioSeed, i));
}

// ============================================================================
// Stream Manager
// ============================================================================

export class StreamManager {
  private seed: number | undefined;
  private readonly streams = new Map<string, SeededRNG>();

  /**
   * Shorthand for `new StreamManager().initialize(rootSeed)`.
   */
  static fromSeed(rootSeed: number): StreamManager {
    return new StreamManager().initialize(rootSeed);
  }

  initialize(rootSeed: number): this {
    assertSeed(rootSeed, "rootSeed");
    if (this.seed !== undefined && this.seed !== rootSeed) {
      throw new ConfigurationError(
        `StreamManager already initialized with seed ${this.seed}`
      );
    }
    this.seed = rootSeed;
    return this;
  }

  get initialized(): boolean {
    return this.seed !== undefined;
  }

  get rootSeed(): number {
    if (this.seed === undefined) {
      throw new ConfigurationError("StreamManager used before initialize()");
    }
    return this.seed;
  }

  /**
   * Generator bound to `name`. Created on first request and cached, so the
   * same instance keeps advancing across calls.
   */
  stream(name: string): SeededRNG {
    const rootSeed = this.rootSeed;
    if (name.length === 0) {
      throw new ConfigurationError("Stream name must be non-empty");
    }
    let rng = this.streams.get(name);
    if (!rng) {
      rng = new SeededRNG(digest(`${rootSeed}:${name}`).readUInt32BE(0));
      this.streams.set(name, rng);
    }
    return rng;
  }

  /**
   * Drop every cached generator; the next `stream(name)` starts from its
   * first draw again.
   */
  reset(): void {
    this.streams.clear();
  }

  streamNames(): string[] {
    return [...this.streams.keys()].sort();
  }
}
