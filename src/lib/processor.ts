/**
 * Event processor
 *
 * Applies one dispatched event to the matching engine and the ledger. The
 * live simulation and replay both go through this class, so a replay runs
 * exactly the code the original run did.
 */

import type { SimulationConfig } from "./config";
import type { Fill } from "./engine-common";
import { OrderNotFoundError } from "./errors";
import type { AckPayload, AnySimEvent } from "./events";
import { AccountingLedger } from "./ledger";
import { SimLogger } from "./logger";
import { FifoTieBreak, MatchingEngine, RandomTieBreak } from "./matching";
import type { CancelResult, SubmitResult } from "./matching";
import type { StreamManager } from "./rng";

export type DispatchOutcome =
  | { type: "ORDER"; result: SubmitResult }
  | { type: "CANCEL"; result: CancelResult }
  | { type: "CANCEL_REJECTED"; error: OrderNotFoundError }
  | { type: "ACK"; ack: AckPayload }
  | { type: "FILL"; fill: Fill }
  | { type: "EXTERNAL" };

export class EventProcessor {
  readonly engine: MatchingEngine;
  readonly ledger: AccountingLedger;
  private readonly logger: SimLogger;

  constructor(config: SimulationConfig, streams: StreamManager, logger: SimLogger = new SimLogger()) {
    this.logger = logger;
    const tieBreak =
      config.tieBreak === "RANDOM"
        ? new RandomTieBreak(streams.stream("mechanism"))
        : new FifoTieBreak();
    this.engine = new MatchingEngine({ logger, tieBreak });
    this.ledger = new AccountingLedger({ pnlMethod: config.pnlMethod, logger });
    for (const account of config.accounts) {
      this.ledger.openAccount(account.owner, account.cash, account.inventory, account.costBasis);
    }
  }

  process(event: AnySimEvent): DispatchOutcome {
    const stamp = { timestamp: event.timestamp, sequence: event.sequence, eventId: event.eventId };
    this.logger.logEventDispatched(
      { time: event.timestamp, eventId: event.eventId },
      event.kind,
      event.sequence
    );

    switch (event.kind) {
      case "ORDER":
        return { type: "ORDER", result: this.engine.submit({ ...event.payload }, stamp) };

      case "CANCEL": {
        const { orderId, owner } = event.payload;
        const resting = this.engine.getOrder(orderId);
        if (resting && resting.owner !== owner) {
          const reason = `not owned by ${owner}`;
          this.logger.logCancelRejected({ time: stamp.timestamp, eventId: stamp.eventId }, orderId, reason);
          return { type: "CANCEL_REJECTED", error: new OrderNotFoundError(orderId, reason) };
        }
        try {
          return { type: "CANCEL", result: this.engine.cancel(orderId, stamp) };
        } catch (err) {
          if (err instanceof OrderNotFoundError) {
            return { type: "CANCEL_REJECTED", error: err };
          }
          throw err;
        }
      }

      case "ACK":
        return { type: "ACK", ack: event.payload };

      case "FILL":
        this.ledger.apply(event.payload, event.eventId);
        return { type: "FILL", fill: event.payload };

      case "NEWS":
      case "BATCH_CLEAR":
      case "RFQ_REQUEST":
      case "RFQ_QUOTE":
      case "RFQ_ACCEPT":
        return { type: "EXTERNAL" };
    }
  }
}

/**
 * ACK owed to the producer of an ORDER or CANCEL, derived from how the core
 * handled it. Undefined for every other event.
 */
export function acknowledgement(event: AnySimEvent, outcome: DispatchOutcome): AckPayload | undefined {
  if (event.kind !== "ORDER" && event.kind !== "CANCEL") return undefined;
  const { orderId, owner } = event.payload;
  const request = { requestId: event.eventId, orderId, owner };

  switch (outcome.type) {
    case "ORDER":
      return outcome.result.rejection
        ? { ...request, accepted: false, reason: outcome.result.rejection.message }
        : { ...request, accepted: true };
    case "CANCEL":
      return { ...request, accepted: true };
    case "CANCEL_REJECTED":
      return { ...request, accepted: false, reason: outcome.error.message };
    default:
      return undefined;
  }
}
