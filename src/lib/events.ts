/**
 * Typed event model
 *
 * Events are totally ordered by (timestamp, sequence). The sequence is
 * assigned by the scheduler when an event is scheduled and never reused;
 * the event id is a final stable tie-break for logs assembled from
 * elsewhere.
 */

import { Decimal } from "decimal.js";
import type { Fill, Side } from "./engine-common";

// ============================================================================
// Event kinds and payloads
// ============================================================================

export type EventKind =
  | "NEWS"
  | "ORDER"
  | "CANCEL"
  | "ACK"
  | "FILL"
  | "BATCH_CLEAR"
  | "RFQ_REQUEST"
  | "RFQ_QUOTE"
  | "RFQ_ACCEPT";

export const EVENT_KINDS: readonly EventKind[] = [
  "NEWS",
  "ORDER",
  "CANCEL",
  "ACK",
  "FILL",
  "BATCH_CLEAR",
  "RFQ_REQUEST",
  "RFQ_QUOTE",
  "RFQ_ACCEPT",
];

export interface NewsPayload {
  topic: string;
  value: number;
}

export interface OrderPayload {
  orderId: string;
  owner: string;
  side: Side;
  price: Decimal;
  quantity: Decimal;
}

export interface CancelPayload {
  orderId: string;
  owner: string;
}

/**
 * Reply to the producer of an ORDER or CANCEL, delivered after the
 * acknowledgement delay.
 */
export interface AckPayload {
  /** Event id of the request being acknowledged. */
  requestId: string;
  orderId: string;
  owner: string;
  accepted: boolean;
  reason?: string;
}

export interface BatchClearPayload {
  batchId: string;
}

export interface RfqRequestPayload {
  rfqId: string;
  requester: string;
  side: Side;
  quantity: Decimal;
}

export interface RfqQuotePayload {
  rfqId: string;
  quoteId: string;
  dealer: string;
  price: Decimal;
  quantity: Decimal;
}

export interface RfqAcceptPayload {
  rfqId: string;
  quoteId: string;
  requester: string;
}

export interface EventPayloads {
  NEWS: NewsPayload;
  ORDER: OrderPayload;
  CANCEL: CancelPayload;
  ACK: AckPayload;
  FILL: Fill;
  BATCH_CLEAR: BatchClearPayload;
  RFQ_REQUEST: RfqRequestPayload;
  RFQ_QUOTE: RfqQuotePayload;
  RFQ_ACCEPT: RfqAcceptPayload;
}

export interface SimEvent<K extends EventKind = EventKind> {
  readonly eventId: string;
  readonly timestamp: number;
  readonly sequence: number;
  readonly kind: K;
  readonly payload: Readonly<EventPayloads[K]>;
}

/** Discriminated union over every event kind. */
export type AnySimEvent = { [K in EventKind]: SimEvent<K> }[EventKind];

/** Kind and payload of an event before the scheduler stamps it. */
export type EventDraft = { [K in EventKind]: { kind: K; payload: EventPayloads[K] } }[EventKind];

export function createEvent(
  draft: EventDraft,
  eventId: string,
  timestamp: number,
  sequence: number
): AnySimEvent {
  Object.freeze(draft.payload);
  return Object.freeze({ ...draft, eventId, timestamp, sequence });
}

// ============================================================================
// Ordering and replay
// ============================================================================

export function compareEvents(
  a: Pick<SimEvent, "timestamp" | "sequence" | "eventId">,
  b: Pick<SimEvent, "timestamp" | "sequence" | "eventId">
): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.sequence !== b.sequence) return a.sequence - b.sequence;
  if (a.eventId < b.eventId) return -1;
  if (a.eventId > b.eventId) return 1;
  return 0;
}

/**
 * Fold an event log into state, in canonical event order regardless of the
 * order the log was handed in.
 */
export function replayEvents<S>(
  events: Iterable<AnySimEvent>,
  reducer: (state: S, event: AnySimEvent) => S,
  initialState: S
): S {
  let state = initialState;
  for (const event of [...events].sort(compareEvents)) {
    state = reducer(state, event);
  }
  return state;
}

/**
 * Canonical JSON for an event log. Decimals are written as strings so two
 * runs can be compared byte for byte.
 */
export function serializeEvents(events: readonly AnySimEvent[]): string {
  return JSON.stringify(events, (_key, value: unknown) => {
    if (value instanceof Decimal) {
      return value.toString();
    }
    return value;
  });
}
