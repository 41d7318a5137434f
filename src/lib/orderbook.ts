/**
 * Order Book
 *
 * Each side is a ladder of price levels sorted best-first; each level holds
 * its orders in a FIFO queue ordered by (entryTimestamp, entrySequence).
 * Partially filled orders keep their place in the queue.
 */

import { Decimal } from "decimal.js";
import { compareEntry } from "./engine-common";
import type { Order, Side } from "./engine-common";
import { ZERO } from "./numeric";

export interface PriceLevel {
  price: Decimal;
  side: Side;
  totalQuantity: Decimal;
  orders: Order[];
}

export interface LevelSnapshot {
  price: string;
  totalQuantity: string;
  orders: Array<{
    orderId: string;
    owner: string;
    quantityRemaining: string;
    quantityOriginal: string;
    entryTimestamp: number;
    entrySequence: number;
  }>;
}

export interface BookSnapshot {
  bids: LevelSnapshot[];
  asks: LevelSnapshot[];
}

export class OrderBook {
  private readonly levelsByKey: Record<Side, Map<string, PriceLevel>> = {
    BUY: new Map(),
    SELL: new Map(),
  };
  /** Best price first: bids descending, asks ascending. */
  private readonly ladders: Record<Side, PriceLevel[]> = { BUY: [], SELL: [] };
  private readonly index = new Map<string, Order>();

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  add(order: Order): void {
    const key = order.price.toString();
    let level = this.levelsByKey[order.side].get(key);
    if (!level) {
      level = { price: order.price, side: order.side, totalQuantity: ZERO, orders: [] };
      this.levelsByKey[order.side].set(key, level);
      this.insertLevel(level);
    }

    // Almost always an append; walk back only for out-of-order injections.
    let pos = level.orders.length;
    while (pos > 0 && compareEntry(level.orders[pos - 1], order) > 0) {
      pos--;
    }
    level.orders.splice(pos, 0, order);
    level.totalQuantity = level.totalQuantity.plus(order.quantityRemaining);
    this.index.set(order.orderId, order);
  }

  /**
   * Take `quantity` off a resting order. The order leaves the book once its
   * remaining quantity reaches zero.
   */
  reduce(order: Order, quantity: Decimal): void {
    const level = this.levelOf(order);
    order.quantityRemaining = order.quantityRemaining.minus(quantity);
    level.totalQuantity = level.totalQuantity.minus(quantity);
    if (order.quantityRemaining.isZero()) {
      this.detach(level, order);
    }
  }

  remove(orderId: string): Order | undefined {
    const order = this.index.get(orderId);
    if (!order) return undefined;
    const level = this.levelOf(order);
    level.totalQuantity = level.totalQuantity.minus(order.quantityRemaining);
    this.detach(level, order);
    return order;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  best(side: Side): PriceLevel | undefined {
    return this.ladders[side][0];
  }

  bestBid(): Decimal | undefined {
    return this.best("BUY")?.price;
  }

  bestAsk(): Decimal | undefined {
    return this.best("SELL")?.price;
  }

  isCrossed(): boolean {
    const bid = this.bestBid();
    const ask = this.bestAsk();
    return bid !== undefined && ask !== undefined && bid.gte(ask);
  }

  /**
   * Resting quantity at `price`. Without a side both sides are summed; in an
   * uncrossed book at most one of them is non-zero.
   */
  depthAt(price: Decimal, side?: Side): Decimal {
    const key = price.toString();
    const sides: Side[] = side ? [side] : ["BUY", "SELL"];
    let total = ZERO;
    for (const s of sides) {
      const level = this.levelsByKey[s].get(key);
      if (level) total = total.plus(level.totalQuantity);
    }
    return total;
  }

  levels(side: Side): readonly PriceLevel[] {
    return this.ladders[side];
  }

  get(orderId: string): Order | undefined {
    return this.index.get(orderId);
  }

  get size(): number {
    return this.index.size;
  }

  snapshot(): BookSnapshot {
    return {
      bids: this.ladders.BUY.map(snapshotLevel),
      asks: this.ladders.SELL.map(snapshotLevel),
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private levelOf(order: Order): PriceLevel {
    const level = this.levelsByKey[order.side].get(order.price.toString());
    if (!level || !this.index.has(order.orderId)) {
      throw new Error(`Order ${order.orderId} is not resting in the book`);
    }
    return level;
  }

  private detach(level: PriceLevel, order: Order): void {
    const pos = level.orders.indexOf(order);
    if (pos !== -1) level.orders.splice(pos, 1);
    this.index.delete(order.orderId);

    if (level.orders.length === 0) {
      this.levelsByKey[level.side].delete(level.price.toString());
      const ladder = this.ladders[level.side];
      const at = ladder.indexOf(level);
      if (at !== -1) ladder.splice(at, 1);
    }
  }

  private insertLevel(level: PriceLevel): void {
    const ladder = this.ladders[level.side];
    const better = (a: Decimal, b: Decimal) => (level.side === "BUY" ? a.gt(b) : a.lt(b));

    let lo = 0;
    let hi = ladder.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (better(ladder[mid].price, level.price)) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    ladder.splice(lo, 0, level);
  }
}

function snapshotLevel(level: PriceLevel): LevelSnapshot {
  return {
    price: level.price.toString(),
    totalQuantity: level.totalQuantity.toString(),
    orders: level.orders.map((o) => ({
      orderId: o.orderId,
      owner: o.owner,
      quantityRemaining: o.quantityRemaining.toString(),
      quantityOriginal: o.quantityOriginal.toString(),
      entryTimestamp: o.entryTimestamp,
      entrySequence: o.entrySequence,
    })),
  };
}
