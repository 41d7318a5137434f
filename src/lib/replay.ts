/**
 * Replay
 *
 * Rebuilds a run from its event log alone: ORDER and CANCEL events are
 * re-matched by a fresh engine, ACK and FILL events are checked against what
 * re-matching produced, and fills are then applied to a fresh ledger. Any
 * difference from the live run is a determinism bug and is fatal.
 */

import { Decimal } from "decimal.js";
import { resolveConfig } from "./config";
import type { SimulationConfigInput } from "./config";
import type { Fill } from "./engine-common";
import { ReplayDivergenceError } from "./errors";
import { replayEvents } from "./events";
import type { AckPayload, AnySimEvent } from "./events";
import type { AccountSnapshot } from "./ledger";
import type { BookSnapshot } from "./orderbook";
import { EventProcessor, acknowledgement } from "./processor";
import { StreamManager } from "./rng";
import type { MarketSimulation } from "./simulation";

/** End state of a run: what replay must reproduce. */
export interface RunState {
  fills: readonly Fill[];
  accounts: readonly AccountSnapshot[];
  book: BookSnapshot;
}

export interface ReplayResult extends RunState {
  fills: Fill[];
  accounts: AccountSnapshot[];
  eventsProcessed: number;
}

interface ReplayState {
  processor: EventProcessor;
  produced: Fill[];
  /** Fills re-matching produced whose FILL event has not been seen yet. */
  pending: Map<string, Fill>;
  /** Re-derived acknowledgements by request event id. */
  acks: Map<string, AckPayload>;
  eventsProcessed: number;
}

export function replayEventLog(
  events: readonly AnySimEvent[],
  configInput: SimulationConfigInput
): ReplayResult {
  const config = resolveConfig(configInput);
  const initial: ReplayState = {
    processor: new EventProcessor(config, StreamManager.fromSeed(config.seed)),
    produced: [],
    pending: new Map(),
    acks: new Map(),
    eventsProcessed: 0,
  };

  const state = replayEvents(events, (s: ReplayState, event) => {
    if (event.kind === "FILL") {
      const { fillId } = event.payload;
      consumeLogged("fill", s.pending, `fills.${fillId}`, fillId, event.payload, event.eventId);
    } else if (event.kind === "ACK") {
      const { requestId } = event.payload;
      consumeLogged("acknowledgement", s.acks, `acks.${requestId}`, requestId, event.payload, event.eventId);
    }

    const outcome = s.processor.process(event);
    const ack = acknowledgement(event, outcome);
    if (ack) s.acks.set(ack.requestId, ack);
    if (outcome.type === "ORDER") {
      for (const fill of outcome.result.fills) {
        s.produced.push(fill);
        s.pending.set(fill.fillId, fill);
      }
    }
    s.eventsProcessed++;
    return s;
  }, initial);

  return {
    fills: state.produced,
    accounts: state.processor.ledger.snapshots(),
    book: state.processor.engine.snapshot(),
    eventsProcessed: state.eventsProcessed,
  };
}

/**
 * Check a logged record against the one replay produced for the same key,
 * then forget it so it cannot be matched twice.
 */
function consumeLogged<T>(
  what: string,
  pending: Map<string, T>,
  path: string,
  key: string,
  logged: unknown,
  eventId: string
): void {
  const expected = pending.get(key);
  if (expected === undefined) {
    throw new ReplayDivergenceError(`Logged ${what} was not produced by re-matching`, path, eventId);
  }
  const diff = diffValues(path, canonical(expected), canonical(logged));
  if (diff) {
    throw new ReplayDivergenceError(`Logged ${what} differs from re-matched ${what}`, diff, eventId);
  }
  pending.delete(key);
}

/**
 * Replay a live simulation's log and require identical fills, accounts and
 * book contents. `config` defaults to the one the simulation ran with.
 */
export function verifyReplay(
  simulation: MarketSimulation,
  config: SimulationConfigInput = simulation.config
): ReplayResult {
  const replayed = replayEventLog(simulation.eventLog(), config);
  assertSameRun(
    { fills: simulation.fills(), accounts: simulation.accounts(), book: simulation.book() },
    replayed
  );
  return replayed;
}

/**
 * Throw ReplayDivergenceError at the first field where two run states differ.
 */
export function assertSameRun(live: RunState, replayed: RunState): void {
  assertSame("fills", live.fills, replayed.fills);
  assertSame("accounts", live.accounts, replayed.accounts);
  assertSame("book", live.book, replayed.book);
}

function assertSame(path: string, live: unknown, replayed: unknown): void {
  const diff = diffValues(path, canonical(live), canonical(replayed));
  if (diff) {
    throw new ReplayDivergenceError("Replayed state differs from live run", diff);
  }
}

// ============================================================================
// Structural comparison
// ============================================================================

/**
 * Plain-JSON copy with Decimals as strings, so comparison is exact.
 */
function canonical(value: unknown): unknown {
  const json = JSON.stringify(value, (_key, v: unknown) =>
    v instanceof Decimal ? v.toString() : v
  );
  return json === undefined ? undefined : JSON.parse(json);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Path of the first difference between two plain-JSON values, or undefined.
 */
export function diffValues(path: string, a: unknown, b: unknown): string | undefined {
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return `${path}.length`;
    for (let i = 0; i < a.length; i++) {
      const diff = diffValues(`${path}[${i}]`, a[i], b[i]);
      if (diff) return diff;
    }
    return undefined;
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
    for (const key of keys) {
      const diff = diffValues(`${path}.${key}`, a[key], b[key]);
      if (diff) return diff;
    }
    return undefined;
  }
  return Object.is(a, b) ? undefined : path;
}
