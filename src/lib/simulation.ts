/**
 * Deterministic Simulation Kernel
 *
 * Wires one run together: a stream manager seeded from the run's root seed,
 * the event scheduler, the matching engine and the ledger. External agents
 * submit intents; the kernel turns them into ORDER/CANCEL events, processes
 * events strictly one at a time in (timestamp, sequence) order, and schedules
 * ACK and FILL events back onto the queue after the configured latencies.
 *
 * Guarantees: same seed + same config + same intents = identical event log.
 */

import type { Decimal } from "decimal.js";
import { EventLog, EventScheduler } from "./clock";
import { resolveConfig } from "./config";
import type { SimulationConfig, SimulationConfigInput } from "./config";
import type { Fill, OrderIntent, OrderStatus, Side } from "./engine-common";
import { ConfigurationError, InvalidOrderError } from "./errors";
import type { SimulationErrorCode } from "./errors";
import type { AnySimEvent, EventDraft } from "./events";
import { ConstantLatency, JitteredLatency } from "./latency";
import type { LatencyModel } from "./latency";
import type { AccountSnapshot, ReconciliationReport } from "./ledger";
import { SimLogger } from "./logger";
import { normalizeIntent } from "./matching";
import type { NormalizedIntent } from "./matching";
import type { DecimalInput } from "./numeric";
import { formatId } from "./numeric";
import type { BookSnapshot } from "./orderbook";
import { EventProcessor, acknowledgement } from "./processor";
import type { DispatchOutcome } from "./processor";
import { StreamManager } from "./rng";
import type { SeededRNG } from "./rng";

// ============================================================================
// Types
// ============================================================================

export type SubmitResponse =
  | { accepted: true; eventId: string; orderId: string; scheduledAt: number }
  | { accepted: false; reason: string; code: SimulationErrorCode };

export interface CancelResponse {
  eventId: string;
  scheduledAt: number;
}

/** Events produced by collaborators outside the core; carried, not interpreted. */
export type ExternalEventDraft = Exclude<EventDraft, { kind: "ORDER" | "CANCEL" | "ACK" | "FILL" }>;

export interface Dispatch {
  event: AnySimEvent;
  outcome: DispatchOutcome;
}

export type EventListener = (dispatch: Dispatch) => void;

export interface RunOptions {
  /** Stop before the first event later than this time. */
  until?: number;
  maxEvents?: number;
}

/** Streams drawn by the matching engine and the latency model. */
export const CORE_STREAMS: readonly string[] = ["mechanism", "latency"];

// ============================================================================
// Market Simulation
// ============================================================================

export class MarketSimulation {
  readonly config: SimulationConfig;
  private readonly streams: StreamManager;
  private readonly scheduler: EventScheduler;
  private readonly log = new EventLog();
  private readonly logger: SimLogger;
  private readonly processor: EventProcessor;
  private readonly latency: LatencyModel;
  private readonly producedFills: Fill[] = [];
  private readonly listeners = new Set<EventListener>();
  private orderIdCounter = 0;

  constructor(input: SimulationConfigInput, logger: SimLogger = new SimLogger()) {
    this.config = resolveConfig(input);
    this.logger = logger;
    this.streams = StreamManager.fromSeed(this.config.seed);
    this.scheduler = new EventScheduler(this.config.startTime);
    this.processor = new EventProcessor(this.config, this.streams, logger);

    const { submissionDelay, ackDelay, fillDelay, jitter } = this.config.latency;
    this.latency =
      jitter > 0
        ? new JitteredLatency(this.streams.stream("latency"), submissionDelay, fillDelay, jitter, ackDelay)
        : new ConstantLatency(submissionDelay, fillDelay, ackDelay);
  }

  // -------------------------------------------------------------------------
  // Producers
  // -------------------------------------------------------------------------

  /**
   * Validate an intent and schedule its ORDER event. Malformed intents are
   * rejected here and never reach the event log.
   */
  submit(intent: OrderIntent): SubmitResponse {
    const now = this.scheduler.now();
    let normalized: NormalizedIntent;
    try {
      normalized = normalizeIntent(intent);
    } catch (err) {
      if (err instanceof InvalidOrderError) {
        this.logger.logOrderRejected({ time: now }, String(intent.owner), err.message);
        return { accepted: false, reason: err.message, code: err.code };
      }
      throw err;
    }

    this.orderIdCounter++;
    const orderId = formatId("ORD", this.orderIdCounter);
    const event = this.scheduler.schedule(
      { kind: "ORDER", payload: { orderId, ...normalized } },
      now + this.latency.submissionDelay()
    );
    return { accepted: true, eventId: event.eventId, orderId, scheduledAt: event.timestamp };
  }

  /**
   * Schedule a cancel. Whether it removes anything depends only on where it
   * lands in the global event order.
   */
  cancel(orderId: string, owner: string): CancelResponse {
    const event = this.scheduler.schedule(
      { kind: "CANCEL", payload: { orderId, owner } },
      this.scheduler.now() + this.latency.submissionDelay()
    );
    return { eventId: event.eventId, scheduledAt: event.timestamp };
  }

  publish(draft: ExternalEventDraft, at: number = this.scheduler.now()): AnySimEvent {
    return this.scheduler.schedule(draft, at);
  }

  onEvent(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Event loop
  // -------------------------------------------------------------------------

  /**
   * Process the next event to completion. Returns undefined when the queue
   * is empty.
   */
  step(): Dispatch | undefined {
    const event = this.scheduler.advance();
    if (!event) return undefined;

    this.log.append(event);
    const outcome = this.processor.process(event);

    const ack = acknowledgement(event, outcome);
    if (ack) {
      this.scheduler.schedule(
        { kind: "ACK", payload: ack },
        this.scheduler.now() + this.latency.ackDelay()
      );
    }
    if (outcome.type === "ORDER") {
      for (const fill of outcome.result.fills) {
        this.producedFills.push(fill);
        this.scheduler.schedule(
          { kind: "FILL", payload: fill },
          this.scheduler.now() + this.latency.fillDelay()
        );
      }
    }

    const dispatch: Dispatch = { event, outcome };
    for (const listener of [...this.listeners]) {
      listener(dispatch);
    }
    return dispatch;
  }

  /**
   * Drain the queue (or up to `until` / `maxEvents`). Returns the number of
   * events processed.
   */
  run(options: RunOptions = {}): number {
    let processed = 0;
    for (;;) {
      if (options.maxEvents !== undefined && processed >= options.maxEvents) break;
      const next = this.scheduler.peek();
      if (!next) break;
      if (options.until !== undefined && next.timestamp > options.until) break;
      this.step();
      processed++;
    }
    return processed;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  now(): number {
    return this.scheduler.now();
  }

  pendingEvents(): number {
    return this.scheduler.pending();
  }

  bestBid(): Decimal | undefined {
    return this.processor.engine.bestBid();
  }

  bestAsk(): Decimal | undefined {
    return this.processor.engine.bestAsk();
  }

  depthAt(price: DecimalInput, side?: Side): Decimal {
    return this.processor.engine.depthAt(price, side);
  }

  orderStatus(orderId: string): OrderStatus | undefined {
    return this.processor.engine.orderStatus(orderId);
  }

  book(): BookSnapshot {
    return this.processor.engine.snapshot();
  }

  account(owner: string): AccountSnapshot | undefined {
    return this.processor.ledger.snapshot(owner);
  }

  accounts(): AccountSnapshot[] {
    return this.processor.ledger.snapshots();
  }

  eventLog(): readonly AnySimEvent[] {
    return this.log.entries();
  }

  /** Every fill the engine produced, in production order. */
  fills(): readonly Fill[] {
    return this.producedFills;
  }

  reconcile(): ReconciliationReport {
    return this.processor.ledger.reconcile();
  }

  /**
   * Named stream for a collaborator, e.g. `agents.<id>`. Streams the core
   * draws from itself are not handed out: a draw the event log cannot see
   * would change later tie-breaks or delays and break replay.
   */
  stream(name: string): SeededRNG {
    if (CORE_STREAMS.includes(name)) {
      throw new ConfigurationError(`Stream "${name}" is reserved for the simulation core`);
    }
    return this.streams.stream(name);
  }

  getLogger(): SimLogger {
    return this.logger;
  }
}
