/**
 * Simulation Logger
 *
 * Structured, in-memory log of everything the core does. Entries carry
 * simulated time and the id of the event being processed, never wall-clock
 * time, so two runs with the same seed produce identical logs.
 */

import { Decimal } from "decimal.js";
import type { Fill, Order, Side } from "./engine-common";
import type { EventKind } from "./events";

export interface LogContext {
  time: number;
  eventId?: string;
}

export type SimLogEntry = LogContext &
  (
    | { type: "EVENT_DISPATCHED"; data: { kind: EventKind; sequence: number } }
    | { type: "ORDER_ACCEPTED"; data: { order: Order } }
    | { type: "ORDER_REJECTED"; data: { orderId?: string; owner: string; reason: string } }
    | { type: "ORDER_RESTED"; data: { orderId: string; side: Side; price: Decimal; quantity: Decimal } }
    | { type: "FILL"; data: Fill }
    | { type: "ORDER_CANCELLED"; data: { orderId: string; remaining: Decimal } }
    | { type: "CANCEL_REJECTED"; data: { orderId: string; reason: string } }
    | { type: "CROSSED_BOOK_RESOLVED"; data: { fills: number } }
    | { type: "ACCOUNT_UPDATED"; data: { fillId: string; buyer: string; seller: string } }
    | { type: "RECONCILED"; data: { accounts: number; fills: number } }
  );

export type SimLogType = SimLogEntry["type"];

export class SimLogger {
  private logs: SimLogEntry[] = [];

  logEventDispatched(ctx: LogContext, kind: EventKind, sequence: number): void {
    this.logs.push({ ...ctx, type: "EVENT_DISPATCHED", data: { kind, sequence } });
  }

  logOrderAccepted(ctx: LogContext, order: Order): void {
    this.logs.push({ ...ctx, type: "ORDER_ACCEPTED", data: { order: { ...order } } });
  }

  logOrderRejected(ctx: LogContext, owner: string, reason: string, orderId?: string): void {
    this.logs.push({ ...ctx, type: "ORDER_REJECTED", data: { orderId, owner, reason } });
  }

  logOrderRested(ctx: LogContext, order: Order): void {
    this.logs.push({
      ...ctx,
      type: "ORDER_RESTED",
      data: {
        orderId: order.orderId,
        side: order.side,
        price: order.price,
        quantity: order.quantityRemaining,
      },
    });
  }

  logFill(ctx: LogContext, fill: Fill): void {
    this.logs.push({ ...ctx, type: "FILL", data: fill });
  }

  logOrderCancelled(ctx: LogContext, orderId: string, remaining: Decimal): void {
    this.logs.push({ ...ctx, type: "ORDER_CANCELLED", data: { orderId, remaining } });
  }

  logCancelRejected(ctx: LogContext, orderId: string, reason: string): void {
    this.logs.push({ ...ctx, type: "CANCEL_REJECTED", data: { orderId, reason } });
  }

  logCrossedBookResolved(ctx: LogContext, fills: number): void {
    this.logs.push({ ...ctx, type: "CROSSED_BOOK_RESOLVED", data: { fills } });
  }

  logAccountUpdated(ctx: LogContext, fill: Fill): void {
    this.logs.push({
      ...ctx,
      type: "ACCOUNT_UPDATED",
      data: { fillId: fill.fillId, buyer: fill.buyer, seller: fill.seller },
    });
  }

  logReconciled(ctx: LogContext, accounts: number, fills: number): void {
    this.logs.push({ ...ctx, type: "RECONCILED", data: { accounts, fills } });
  }

  getLogs(): readonly SimLogEntry[] {
    return this.logs;
  }

  ofType<T extends SimLogType>(type: T): Extract<SimLogEntry, { type: T }>[] {
    return this.logs.filter((e): e is Extract<SimLogEntry, { type: T }> => e.type === type);
  }

  exportJson(): string {
    return JSON.stringify(
      this.logs,
      (_key, value: unknown) => (value instanceof Decimal ? value.toString() : value),
      2
    );
  }

  clear(): void {
    this.logs = [];
  }
}
