/**
 * Tests for the event scheduler, event log and event ordering helpers
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Decimal } from "decimal.js";
import * as fc from "fast-check";
import { EventLog, EventScheduler } from "../src/lib/clock";
import {
  compareEvents,
  createEvent,
  replayEvents,
  serializeEvents,
} from "../src/lib/events";
import type { AnySimEvent } from "../src/lib/events";
import { ConfigurationError } from "../src/lib/errors";

function news(topic: string, value = 0) {
  return { kind: "NEWS" as const, payload: { topic, value } };
}

describe("EventScheduler", () => {
  let scheduler: EventScheduler;

  beforeEach(() => {
    scheduler = new EventScheduler();
  });

  it("should stamp events with increasing sequence numbers and ids", () => {
    const first = scheduler.schedule(news("a"), 10);
    const second = scheduler.schedule(news("b"), 5);

    expect(first.sequence).toBe(1);
    expect(first.eventId).toBe("EVT-00000001");
    expect(second.sequence).toBe(2);
    expect(second.eventId).toBe("EVT-00000002");
    expect(scheduler.lastSequence()).toBe(2);
  });

  it("should dispatch by timestamp, then by scheduling order", () => {
    scheduler.schedule(news("late"), 10);
    scheduler.schedule(news("early-1"), 5);
    scheduler.schedule(news("early-2"), 5);

    const order: string[] = [];
    const times: number[] = [];
    for (let event = scheduler.advance(); event; event = scheduler.advance()) {
      if (event.kind === "NEWS") order.push(event.payload.topic);
      times.push(scheduler.now());
    }

    expect(order).toEqual(["early-1", "early-2", "late"]);
    expect(times).toEqual([5, 5, 10]);
  });

  it("should default to scheduling at the current time", () => {
    scheduler.schedule(news("x"), 7);
    scheduler.advance();
    const event = scheduler.schedule(news("y"));
    expect(event.timestamp).toBe(7);
  });

  it("should refuse to schedule into the past", () => {
    scheduler.schedule(news("x"), 10);
    scheduler.advance();
    expect(() => scheduler.schedule(news("y"), 9)).toThrow(ConfigurationError);
    expect(() => scheduler.schedule(news("y"), 10)).not.toThrow();
  });

  it("should refuse non-integer times", () => {
    expect(() => scheduler.schedule(news("x"), 1.5)).toThrow(ConfigurationError);
    expect(() => new EventScheduler(-1)).toThrow(ConfigurationError);
  });

  it("should leave the clock alone when the queue is empty", () => {
    const start = new EventScheduler(100);
    expect(start.advance()).toBeUndefined();
    expect(start.now()).toBe(100);
    expect(start.peek()).toBeUndefined();
    expect(start.pending()).toBe(0);
  });

  it("should freeze events and their payloads", () => {
    const event = scheduler.schedule(news("x", 1));
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
  });

  it("should always dispatch in (timestamp, sequence) order", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 0, max: 50 }), { minLength: 1, maxLength: 60 }), (times) => {
        const s = new EventScheduler();
        for (const t of times) s.schedule(news("t"), t);

        const seen: AnySimEvent[] = [];
        for (let e = s.advance(); e; e = s.advance()) seen.push(e);

        expect(seen).toHaveLength(times.length);
        for (let i = 1; i < seen.length; i++) {
          expect(compareEvents(seen[i - 1], seen[i])).toBeLessThan(0);
        }
      })
    );
  });
});

describe("EventLog", () => {
  it("should accept events in order and filter by kind", () => {
    const scheduler = new EventScheduler();
    scheduler.schedule(news("a"), 1);
    scheduler.schedule({ kind: "BATCH_CLEAR", payload: { batchId: "B-1" } }, 2);

    const log = new EventLog();
    for (let e = scheduler.advance(); e; e = scheduler.advance()) log.append(e);

    expect(log.size).toBe(2);
    expect(log.ofKind("BATCH_CLEAR").map((e) => e.payload.batchId)).toEqual(["B-1"]);
  });

  it("should reject an event that does not follow the last one", () => {
    const log = new EventLog();
    const later = createEvent(news("b"), "EVT-00000002", 5, 2);
    const earlier = createEvent(news("a"), "EVT-00000001", 5, 1);
    log.append(later);
    expect(() => log.append(earlier)).toThrow(ConfigurationError);
    expect(() => log.append(later)).toThrow(ConfigurationError);
  });
});

describe("Event ordering helpers", () => {
  it("should break full ties on event id", () => {
    const a = createEvent(news("a"), "EVT-A", 1, 1);
    const b = createEvent(news("b"), "EVT-B", 1, 1);
    expect(compareEvents(a, b)).toBeLessThan(0);
    expect(compareEvents(b, a)).toBeGreaterThan(0);
    expect(compareEvents(a, a)).toBe(0);
  });

  it("should fold a shuffled log in canonical order", () => {
    const events = [
      createEvent(news("c"), "EVT-00000003", 2, 3),
      createEvent(news("a"), "EVT-00000001", 1, 1),
      createEvent(news("b"), "EVT-00000002", 1, 2),
    ];
    const topics = replayEvents(
      events,
      (acc: string[], e) => (e.kind === "NEWS" ? [...acc, e.payload.topic] : acc),
      []
    );
    expect(topics).toEqual(["a", "b", "c"]);
  });

  it("should serialize decimals as strings", () => {
    const event = createEvent(
      {
        kind: "ORDER",
        payload: {
          orderId: "ORD-1",
          owner: "alice",
          side: "BUY",
          price: new Decimal("1.50"),
          quantity: new Decimal(2),
        },
      },
      "EVT-1",
      0,
      1
    );
    expect(serializeEvents([event])).toBe(
      '[{"kind":"ORDER","payload":{"orderId":"ORD-1","owner":"alice","side":"BUY","price":"1.5","quantity":"2"},"eventId":"EVT-1","timestamp":0,"sequence":1}]'
    );
  });
});
