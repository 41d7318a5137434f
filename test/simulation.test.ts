/**
 * Tests for the simulation kernel: event ordering, latency, cancels and
 * run-to-run determinism
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MarketSimulation } from "../src/lib/simulation";
import type { Dispatch } from "../src/lib/simulation";
import { serializeEvents } from "../src/lib/events";
import type { AckPayload } from "../src/lib/events";
import { ConfigurationError } from "../src/lib/errors";
import { randomRun } from "./helpers";

const ACCOUNTS = [
  { owner: "alice", cash: 10000 },
  { owner: "bob", cash: 0, inventory: 10 },
];

function acks(sim: MarketSimulation): AckPayload[] {
  return sim.eventLog().flatMap((e) => (e.kind === "ACK" ? [e.payload] : []));
}

function outcomes(sim: MarketSimulation): Dispatch["outcome"]["type"][] {
  const seen: Dispatch["outcome"]["type"][] = [];
  sim.onEvent((d) => seen.push(d.outcome.type));
  return seen;
}

describe("MarketSimulation: order flow", () => {
  let sim: MarketSimulation;

  beforeEach(() => {
    sim = new MarketSimulation({ seed: 42, accounts: ACCOUNTS });
  });

  it("should match through events and settle fills on the ledger", () => {
    const ask = sim.submit({ owner: "bob", side: "SELL", price: 101, quantity: 10 });
    expect(sim.run()).toBe(2);
    const bid = sim.submit({ owner: "alice", side: "BUY", price: 102, quantity: 15 });
    expect(sim.run()).toBe(3);

    expect(ask).toEqual({ accepted: true, eventId: "EVT-00000001", orderId: "ORD-00000001", scheduledAt: 0 });
    expect(bid.accepted && bid.orderId).toBe("ORD-00000002");

    expect(sim.eventLog().map((e) => [e.eventId, e.kind])).toEqual([
      ["EVT-00000001", "ORDER"],
      ["EVT-00000002", "ACK"],
      ["EVT-00000003", "ORDER"],
      ["EVT-00000004", "ACK"],
      ["EVT-00000005", "FILL"],
    ]);
    expect(sim.fills()).toHaveLength(1);
    expect(sim.fills()[0].price.toString()).toBe("101");
    expect(sim.bestBid()?.toString()).toBe("102");
    expect(sim.depthAt(102).toString()).toBe("5");
    expect(sim.orderStatus("ORD-00000002")).toBe("PARTIALLY_FILLED");

    expect(sim.account("alice")?.cash.toString()).toBe("8990");
    expect(sim.account("alice")?.inventory.toString()).toBe("10");
    expect(sim.account("bob")?.cash.toString()).toBe("1010");
    expect(sim.account("bob")?.inventory.toString()).toBe("0");
    expect(sim.reconcile().fills).toBe(1);
  });

  it("should fill same-price bids first come first served", () => {
    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 5 });
    sim.submit({ owner: "carol", side: "BUY", price: 100, quantity: 5 });
    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 7 });
    sim.run();

    expect(sim.fills().map((f) => [f.buyer, f.quantity.toString()])).toEqual([
      ["alice", "5"],
      ["carol", "2"],
    ]);
    expect(sim.depthAt(100, "BUY").toString()).toBe("3");
    expect(sim.account("carol")?.inventory.toString()).toBe("2");
  });

  it("should reject malformed intents without scheduling anything", () => {
    const response = sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 0 });

    expect(response).toEqual({
      accepted: false,
      reason: "Quantity must be positive, got 0",
      code: "INVALID_ORDER",
    });
    expect(sim.pendingEvents()).toBe(0);
    expect(sim.getLogger().ofType("ORDER_REJECTED")).toHaveLength(1);
  });

  it("should refuse cancels from anyone but the owner", () => {
    const seen = outcomes(sim);
    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 5 });
    sim.cancel("ORD-00000001", "mallory");
    sim.run();

    expect(seen).toEqual(["ORDER", "CANCEL_REJECTED", "ACK", "ACK"]);
    expect(sim.orderStatus("ORD-00000001")).toBe("RESTING");
    expect(sim.getLogger().ofType("CANCEL_REJECTED")[0].data.reason).toBe("not owned by mallory");
    expect(acks(sim)).toEqual([
      { requestId: "EVT-00000001", orderId: "ORD-00000001", owner: "bob", accepted: true },
      {
        requestId: "EVT-00000002",
        orderId: "ORD-00000001",
        owner: "mallory",
        accepted: false,
        reason: "Order ORD-00000001 not found: not owned by mallory",
      },
    ]);
  });

  it("should carry external events through the log untouched", () => {
    const seen = outcomes(sim);
    const news = sim.publish({ kind: "NEWS", payload: { topic: "rate", value: 1 } }, 7);
    sim.run();

    expect(seen).toEqual(["EXTERNAL"]);
    expect(sim.eventLog()).toEqual([news]);
    expect(sim.now()).toBe(7);
    expect(() => sim.publish({ kind: "BATCH_CLEAR", payload: { batchId: "B-1" } }, 3)).toThrow(
      ConfigurationError
    );
  });

  it("should stop at maxEvents and return undefined from an empty step", () => {
    sim.submit({ owner: "alice", side: "BUY", price: 90, quantity: 1 });
    sim.submit({ owner: "alice", side: "BUY", price: 91, quantity: 1 });
    sim.submit({ owner: "alice", side: "BUY", price: 92, quantity: 1 });

    expect(sim.run({ maxEvents: 2 })).toBe(2);
    expect(sim.pendingEvents()).toBe(3);
    expect(sim.step()?.event.eventId).toBe("EVT-00000003");
    expect(sim.run()).toBe(3);
    expect(sim.step()).toBeUndefined();
  });

  it("should stop notifying a listener once unsubscribed", () => {
    let calls = 0;
    const unsubscribe = sim.onEvent(() => {
      calls++;
    });
    sim.submit({ owner: "alice", side: "BUY", price: 90, quantity: 1 });
    sim.run();
    unsubscribe();
    sim.submit({ owner: "alice", side: "BUY", price: 91, quantity: 1 });
    sim.run();
    expect(calls).toBe(2);
  });

  it("should log every dispatched event", () => {
    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 1 });
    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 1 });
    sim.run();
    const dispatched = sim.getLogger().ofType("EVENT_DISPATCHED");
    expect(dispatched.map((e) => e.data.kind)).toEqual(["ORDER", "ORDER", "ACK", "ACK", "FILL"]);
    expect(dispatched.map((e) => e.eventId)).toEqual(sim.eventLog().map((e) => e.eventId));
  });
});

describe("MarketSimulation: latency and cancel races", () => {
  it("should lose a cancel that lands after the matching order", () => {
    const sim = new MarketSimulation({ seed: 1, accounts: ACCOUNTS, latency: { submissionDelay: 5 } });
    const seen = outcomes(sim);

    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 10 });
    sim.run();
    expect(sim.now()).toBe(5);

    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 10 });
    sim.cancel("ORD-00000001", "bob");
    sim.run();

    expect(seen).toEqual(["ORDER", "ACK", "ORDER", "CANCEL_REJECTED", "ACK", "FILL", "ACK"]);
    expect(sim.getLogger().ofType("CANCEL_REJECTED")[0].data.reason).toBe("already filled");
    expect(sim.fills()).toHaveLength(1);
    expect(acks(sim).at(-1)).toEqual({
      requestId: "EVT-00000004",
      orderId: "ORD-00000001",
      owner: "bob",
      accepted: false,
      reason: "Order ORD-00000001 not found: already filled",
    });
  });

  it("should win a cancel that lands before the matching order", () => {
    const sim = new MarketSimulation({ seed: 1, accounts: ACCOUNTS, latency: { submissionDelay: 5 } });
    const seen = outcomes(sim);

    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 10 });
    sim.run();
    sim.cancel("ORD-00000001", "bob");
    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 10 });
    sim.run();

    expect(seen).toEqual(["ORDER", "ACK", "CANCEL", "ORDER", "ACK", "ACK"]);
    expect(sim.fills()).toEqual([]);
    expect(sim.orderStatus("ORD-00000001")).toBe("CANCELED");
    expect(sim.bestBid()?.toString()).toBe("100");
    expect(sim.bestAsk()).toBeUndefined();
  });

  it("should settle fills only after the fill delay", () => {
    const sim = new MarketSimulation({ seed: 1, accounts: ACCOUNTS, latency: { fillDelay: 3 } });
    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 2 });
    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 2 });

    expect(sim.run({ until: 2 })).toBe(4);
    expect(sim.fills()).toHaveLength(1);
    expect(sim.account("alice")?.cash.toString()).toBe("10000");
    expect(sim.pendingEvents()).toBe(1);

    expect(sim.run()).toBe(1);
    expect(sim.now()).toBe(3);
    expect(sim.account("alice")?.cash.toString()).toBe("9800");
  });
});

describe("MarketSimulation: acknowledgements", () => {
  it("should acknowledge each request after the ack delay", () => {
    const sim = new MarketSimulation({
      seed: 1,
      accounts: ACCOUNTS,
      latency: { submissionDelay: 2, ackDelay: 3, fillDelay: 5 },
    });
    sim.submit({ owner: "bob", side: "SELL", price: 100, quantity: 2 });
    sim.submit({ owner: "alice", side: "BUY", price: 100, quantity: 2 });
    sim.run();

    expect(sim.eventLog().map((e) => [e.kind, e.timestamp])).toEqual([
      ["ORDER", 2],
      ["ORDER", 2],
      ["ACK", 5],
      ["ACK", 5],
      ["FILL", 7],
    ]);
    expect(acks(sim)[1]).toEqual({
      requestId: "EVT-00000002",
      orderId: "ORD-00000002",
      owner: "alice",
      accepted: true,
    });
    expect(sim.now()).toBe(7);
  });

  it("should not acknowledge external events or fills", () => {
    const sim = new MarketSimulation({ seed: 1 });
    sim.publish({ kind: "NEWS", payload: { topic: "rate", value: 2 } });
    sim.run();
    expect(acks(sim)).toEqual([]);
  });
});

describe("MarketSimulation: random streams", () => {
  it("should refuse streams the core draws from", () => {
    const sim = new MarketSimulation({ seed: 3, tieBreak: "RANDOM" });
    expect(() => sim.stream("mechanism")).toThrow(ConfigurationError);
    expect(() => sim.stream("latency")).toThrow('Stream "latency" is reserved for the simulation core');
  });

  it("should hand out collaborator streams reproducibly", () => {
    const first = new MarketSimulation({ seed: 3 }).stream("agents.alice").random();
    const second = new MarketSimulation({ seed: 3 }).stream("agents.alice").random();
    expect(first).toBe(second);
  });
});

describe("MarketSimulation: determinism", () => {
  it("should produce a byte-identical event log for the same seed", () => {
    const first = serializeEvents(randomRun(2024).eventLog());
    const second = serializeEvents(randomRun(2024).eventLog());
    expect(first).toBe(second);
  });

  it("should produce a different log for a different seed", () => {
    expect(serializeEvents(randomRun(1).eventLog())).not.toBe(serializeEvents(randomRun(2).eventLog()));
  });

  it("should keep the ledger zero-sum across a random run", () => {
    const sim = randomRun(7);
    const report = sim.reconcile();
    expect(report.totalCashDelta.isZero()).toBe(true);
    expect(report.totalInventoryDelta.isZero()).toBe(true);
    expect(report.fills).toBe(sim.fills().length);
  });

  it("should never leave the live book crossed", () => {
    const sim = new MarketSimulation({ seed: 3, tieBreak: "RANDOM" });
    const rng = sim.stream("agents.flow");
    sim.onEvent(() => {
      const bid = sim.bestBid();
      const ask = sim.bestAsk();
      expect(bid !== undefined && ask !== undefined && bid.gte(ask)).toBe(false);
    });
    for (let i = 0; i < 200; i++) {
      sim.submit({
        owner: rng.randomChoice(["a", "b", "c"]),
        side: rng.random() < 0.5 ? "BUY" : "SELL",
        price: rng.randomRange(98, 102),
        quantity: rng.randomRange(1, 5),
      });
      sim.run();
    }
  });
});

describe("MarketSimulation: configuration", () => {
  it("should reject invalid configuration before building anything", () => {
    expect(() => new MarketSimulation({ seed: -1 })).toThrow(ConfigurationError);
    expect(() => new MarketSimulation({ seed: 1, latency: { fillDelay: 1.5 } })).toThrow(ConfigurationError);
    expect(
      () => new MarketSimulation({ seed: 1, accounts: [{ owner: "a" }, { owner: "a" }] })
    ).toThrow("Duplicate account a");
    expect(
      () => new MarketSimulation({ seed: 1, accounts: [{ owner: "a", cash: "lots" }] })
    ).toThrow(ConfigurationError);
  });

  it("should fill in defaults", () => {
    const sim = new MarketSimulation({ seed: 5 });
    expect(sim.config).toEqual({
      seed: 5,
      startTime: 0,
      accounts: [],
      latency: { submissionDelay: 0, ackDelay: 0, fillDelay: 0, jitter: 0 },
      pnlMethod: "AVERAGE_COST",
      tieBreak: "FIFO",
    });
  });
});
