/**
 * Common Types
 *
 * Domain records shared by the matching engine, the ledger and the
 * simulation kernel.
 */

import type { Decimal } from "decimal.js";
import type { DecimalInput } from "./numeric";

// ============================================================================
// Common Types
// ============================================================================

export type Side = "BUY" | "SELL";

export const SIDES: readonly Side[] = ["BUY", "SELL"];

export type OrderStatus =
  | "RESTING"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "CANCELED"
  | "REJECTED";

/**
 * Order intent as submitted by an agent. Values are normalized to Decimal
 * once the intent is accepted.
 */
export interface OrderIntent {
  owner: string;
  side: Side;
  price: DecimalInput;
  quantity: DecimalInput;
}

/**
 * Position of an event in the global order. Every mutation of the book is
 * stamped with the event that caused it.
 */
export interface EventStamp {
  timestamp: number;
  sequence: number;
  eventId?: string;
}

export interface Order {
  orderId: string;
  owner: string;
  side: Side;
  price: Decimal;
  quantityOriginal: Decimal;
  quantityRemaining: Decimal;
  entryTimestamp: number;
  entrySequence: number;
  status: OrderStatus;
}

/**
 * One execution. `price` is always the maker's resting price.
 */
export interface Fill {
  fillId: string;
  makerOrderId: string;
  takerOrderId: string;
  buyOrderId: string;
  sellOrderId: string;
  buyer: string;
  seller: string;
  price: Decimal;
  quantity: Decimal;
  timestamp: number;
}

export function oppositeSide(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}

export function isSide(value: unknown): value is Side {
  return value === "BUY" || value === "SELL";
}

/**
 * Price-time priority: earlier (timestamp, sequence) wins.
 */
export function compareEntry(
  a: Pick<Order, "entryTimestamp" | "entrySequence">,
  b: Pick<Order, "entryTimestamp" | "entrySequence">
): number {
  if (a.entryTimestamp !== b.entryTimestamp) {
    return a.entryTimestamp - b.entryTimestamp;
  }
  return a.entrySequence - b.entrySequence;
}
