/**
 * Discrete-event clock
 *
 * Holds pending events in a binary heap ordered by (timestamp, sequence).
 * Sequence numbers are handed out at scheduling time, so two events for the
 * same timestamp are always processed in the order they were scheduled.
 */

import { ConfigurationError } from "./errors";
import { compareEvents, createEvent } from "./events";
import type { AnySimEvent, EventDraft, EventKind } from "./events";
import { formatId } from "./numeric";

// ============================================================================
// Event Scheduler
// ============================================================================

export class EventScheduler {
  private readonly heap: AnySimEvent[] = [];
  private currentTime: number;
  private sequenceCounter = 0;

  constructor(startTime = 0) {
    if (!Number.isSafeInteger(startTime) || startTime < 0) {
      throw new ConfigurationError(`startTime must be a non-negative integer, got ${startTime}`);
    }
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  /**
   * Insert a new event at `at` (defaults to now) and return it stamped with
   * its id and sequence number.
   */
  schedule(draft: EventDraft, at: number = this.currentTime): AnySimEvent {
    if (!Number.isSafeInteger(at)) {
      throw new ConfigurationError(`Event time must be an integer, got ${at}`);
    }
    if (at < this.currentTime) {
      throw new ConfigurationError(
        `Cannot schedule ${draft.kind} at ${at}; clock is already at ${this.currentTime}`
      );
    }
    this.sequenceCounter++;
    const event = createEvent(
      draft,
      formatId("EVT", this.sequenceCounter),
      at,
      this.sequenceCounter
    );
    this.push(event);
    return event;
  }

  /**
   * Pop the next event and move the clock to its timestamp.
   */
  advance(): AnySimEvent | undefined {
    const next = this.pop();
    if (next) {
      this.currentTime = next.timestamp;
    }
    return next;
  }

  peek(): AnySimEvent | undefined {
    return this.heap[0];
  }

  pending(): number {
    return this.heap.length;
  }

  /** Sequence number the most recently scheduled event received. */
  lastSequence(): number {
    return this.sequenceCounter;
  }

  // -------------------------------------------------------------------------
  // Heap
  // -------------------------------------------------------------------------

  private push(event: AnySimEvent): void {
    const heap = this.heap;
    heap.push(event);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (compareEvents(heap[i], heap[parent]) >= 0) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private pop(): AnySimEvent | undefined {
    const heap = this.heap;
    if (heap.length === 0) return undefined;
    const top = heap[0];
    const last = heap.pop();
    if (last !== undefined && heap.length > 0) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < heap.length && compareEvents(heap[left], heap[smallest]) < 0) smallest = left;
        if (right < heap.length && compareEvents(heap[right], heap[smallest]) < 0) smallest = right;
        if (smallest === i) break;
        [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
        i = smallest;
      }
    }
    return top;
  }
}

// ============================================================================
// Event Log
// ============================================================================

/**
 * Append-only record of dispatched events, in dispatch order.
 */
export class EventLog {
  private readonly events: AnySimEvent[] = [];

  append(event: AnySimEvent): void {
    const last = this.events[this.events.length - 1];
    if (last && compareEvents(last, event) >= 0) {
      throw new ConfigurationError(
        `Event ${event.eventId} logged out of order after ${last.eventId}`
      );
    }
    this.events.push(event);
  }

  entries(): readonly AnySimEvent[] {
    return this.events;
  }

  ofKind<K extends EventKind>(kind: K): Extract<AnySimEvent, { kind: K }>[] {
    return this.events.filter((e): e is Extract<AnySimEvent, { kind: K }> => e.kind === kind);
  }

  get size(): number {
    return this.events.length;
  }
}
