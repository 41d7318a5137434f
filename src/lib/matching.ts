/**
 * Continuous double auction matching engine
 *
 * Price-time priority with partial fills and cancels. Every call is stamped
 * with the (timestamp, sequence) of the event that triggered it; the engine
 * never reads a wall clock, so replaying the same events reproduces the same
 * fills.
 *
 * Order lifecycle:
 *   submitted -> REJECTED
 *   submitted -> RESTING | PARTIALLY_FILLED | FILLED
 *   RESTING | PARTIALLY_FILLED -> PARTIALLY_FILLED | FILLED | CANCELED
 */

import { Decimal } from "decimal.js";
import { compareEntry, isSide, oppositeSide } from "./engine-common";
import type { EventStamp, Fill, Order, OrderIntent, OrderStatus, Side } from "./engine-common";
import { InvalidOrderError, OrderNotFoundError } from "./errors";
import { SimLogger } from "./logger";
import type { LogContext } from "./logger";
import { DECIMAL_PRECISION, formatId, toDecimal } from "./numeric";
import type { DecimalInput } from "./numeric";
import { OrderBook } from "./orderbook";
import type { BookSnapshot } from "./orderbook";
import type { SeededRNG } from "./rng";

// ============================================================================
// Types
// ============================================================================

export interface OrderRequest extends OrderIntent {
  /** Assigned by the caller when it needs the id before matching runs. */
  orderId?: string;
}

export interface LevelChange {
  side: Side;
  price: Decimal;
  change: Decimal;
}

export interface BookDelta {
  added: string[];
  removed: string[];
  modified: string[];
  levels: LevelChange[];
}

export interface SubmitResult {
  accepted: boolean;
  orderId: string;
  status: OrderStatus;
  /** Copy of the order after matching; absent when rejected. */
  order?: Order;
  fills: Fill[];
  delta: BookDelta;
  rejection?: InvalidOrderError;
}

export interface CancelResult {
  orderId: string;
  status: "CANCELED";
  canceledQuantity: Decimal;
  filledQuantity: Decimal;
  delta: BookDelta;
}

// ============================================================================
// Tie-break policies
// ============================================================================

export type TieBreakPolicyName = "FIFO" | "RANDOM";

/**
 * Chooses which order in the best price level trades next. Price priority
 * is applied before the policy is consulted.
 */
export interface TieBreakPolicy {
  readonly name: TieBreakPolicyName;
  select(queue: readonly Order[]): number;
}

export class FifoTieBreak implements TieBreakPolicy {
  readonly name = "FIFO";

  select(): number {
    return 0;
  }
}

/**
 * Uniform pick within a level. Draws from the caller's "mechanism" stream.
 */
export class RandomTieBreak implements TieBreakPolicy {
  readonly name = "RANDOM";

  constructor(private readonly rng: SeededRNG) {}

  select(queue: readonly Order[]): number {
    return queue.length <= 1 ? 0 : this.rng.randomInt(queue.length);
  }
}

// ============================================================================
// Book delta recorder
// ============================================================================

class DeltaRecorder {
  private readonly added = new Set<string>();
  private readonly removed = new Set<string>();
  private readonly modified = new Set<string>();
  private readonly levels = new Map<string, LevelChange>();

  rested(order: Order): void {
    this.added.add(order.orderId);
    this.level(order.side, order.price, order.quantityRemaining);
  }

  reduced(order: Order, quantity: Decimal): void {
    this.level(order.side, order.price, quantity.negated());
    if (order.quantityRemaining.isZero()) {
      this.removed.add(order.orderId);
    } else {
      this.modified.add(order.orderId);
    }
  }

  canceled(order: Order): void {
    this.level(order.side, order.price, order.quantityRemaining.negated());
    this.removed.add(order.orderId);
  }

  finish(): BookDelta {
    return {
      added: [...this.added].filter((id) => !this.removed.has(id)),
      removed: [...this.removed].filter((id) => !this.added.has(id)),
      modified: [...this.modified].filter((id) => !this.removed.has(id) && !this.added.has(id)),
      levels: [...this.levels.values()].filter((l) => !l.change.isZero()),
    };
  }

  private level(side: Side, price: Decimal, change: Decimal): void {
    const key = `${side}:${price.toString()}`;
    const existing = this.levels.get(key);
    if (existing) {
      existing.change = existing.change.plus(change);
    } else {
      this.levels.set(key, { side, price, change });
    }
  }
}

function emptyDelta(): BookDelta {
  return { added: [], removed: [], modified: [], levels: [] };
}

// ============================================================================
// Matching Engine
// ============================================================================

export interface MatchingEngineOptions {
  logger?: SimLogger;
  tieBreak?: TieBreakPolicy;
}

export class MatchingEngine {
  private readonly book = new OrderBook();
  private readonly logger: SimLogger;
  private readonly tieBreak: TieBreakPolicy;
  /** Final status of every order that has left the book. */
  private readonly terminal = new Map<string, OrderStatus>();
  private orderIdCounter = 0;
  private fillIdCounter = 0;

  constructor(options: MatchingEngineOptions = {}) {
    this.logger = options.logger ?? new SimLogger();
    this.tieBreak = options.tieBreak ?? new FifoTieBreak();
  }

  // -------------------------------------------------------------------------
  // Order Operations
  // -------------------------------------------------------------------------

  /**
   * Match a new order against the book and rest any remainder.
   */
  submit(request: OrderRequest, stamp: EventStamp): SubmitResult {
    const ctx = toContext(stamp);
    let order: Order;
    try {
      order = this.createOrder(request, stamp);
    } catch (err) {
      if (err instanceof InvalidOrderError) {
        return this.reject(ctx, request, err);
      }
      throw err;
    }

    this.logger.logOrderAccepted(ctx, order);
    const delta = new DeltaRecorder();
    const fills = this.match(order, stamp, delta);

    if (order.quantityRemaining.isZero()) {
      order.status = "FILLED";
      this.terminal.set(order.orderId, "FILLED");
    } else {
      order.status = fills.length > 0 ? "PARTIALLY_FILLED" : "RESTING";
      this.book.add(order);
      delta.rested(order);
      this.logger.logOrderRested(ctx, order);
    }

    fills.push(...this.uncross(stamp, delta));

    return {
      accepted: true,
      orderId: order.orderId,
      status: order.status,
      order: { ...order },
      fills,
      delta: delta.finish(),
    };
  }

  /**
   * Remove a resting order. Fills already produced against it stand; it only
   * stops future matches.
   */
  cancel(orderId: string, stamp: EventStamp): CancelResult {
    const ctx = toContext(stamp);
    const order = this.book.get(orderId);
    if (!order) {
      const status = this.terminal.get(orderId);
      const reason = status ? `already ${status.toLowerCase()}` : "unknown order";
      this.logger.logCancelRejected(ctx, orderId, reason);
      throw new OrderNotFoundError(orderId, reason);
    }

    const delta = new DeltaRecorder();
    delta.canceled(order);
    this.book.remove(orderId);
    const canceledQuantity = order.quantityRemaining;
    order.status = "CANCELED";
    this.terminal.set(orderId, "CANCELED");
    this.logger.logOrderCancelled(ctx, orderId, canceledQuantity);

    return {
      orderId,
      status: "CANCELED",
      canceledQuantity,
      filledQuantity: order.quantityOriginal.minus(canceledQuantity),
      delta: delta.finish(),
    };
  }

  /**
   * Place an order directly on the book without matching it first. This is
   * the path by which an externally injected state can cross the book; the
   * engine uncrosses it before returning.
   */
  injectResting(request: OrderRequest, stamp: EventStamp): SubmitResult {
    const ctx = toContext(stamp);
    let order: Order;
    try {
      order = this.createOrder(request, stamp);
    } catch (err) {
      if (err instanceof InvalidOrderError) {
        return this.reject(ctx, request, err);
      }
      throw err;
    }

    this.logger.logOrderAccepted(ctx, order);
    const delta = new DeltaRecorder();
    this.book.add(order);
    delta.rested(order);
    this.logger.logOrderRested(ctx, order);

    const fills = this.uncross(stamp, delta);
    return {
      accepted: true,
      orderId: order.orderId,
      status: order.status,
      order: { ...order },
      fills,
      delta: delta.finish(),
    };
  }

  // -------------------------------------------------------------------------
  // Market Data
  // -------------------------------------------------------------------------

  bestBid(): Decimal | undefined {
    return this.book.bestBid();
  }

  bestAsk(): Decimal | undefined {
    return this.book.bestAsk();
  }

  depthAt(price: DecimalInput, side?: Side): Decimal {
    return this.book.depthAt(toDecimal(price), side);
  }

  getOrder(orderId: string): Readonly<Order> | undefined {
    const order = this.book.get(orderId);
    return order ? { ...order } : undefined;
  }

  orderStatus(orderId: string): OrderStatus | undefined {
    return this.book.get(orderId)?.status ?? this.terminal.get(orderId);
  }

  snapshot(): BookSnapshot {
    return this.book.snapshot();
  }

  getLogger(): SimLogger {
    return this.logger;
  }

  // -------------------------------------------------------------------------
  // Private Matching
  // -------------------------------------------------------------------------

  private match(taker: Order, stamp: EventStamp, delta: DeltaRecorder): Fill[] {
    const fills: Fill[] = [];
    const opposite = oppositeSide(taker.side);

    while (taker.quantityRemaining.gt(0)) {
      const level = this.book.best(opposite);
      if (!level || !isMarketable(taker.side, taker.price, level.price)) break;

      const maker = level.orders[this.tieBreak.select(level.orders)];
      const quantity = Decimal.min(taker.quantityRemaining, maker.quantityRemaining);
      fills.push(this.execute(maker, taker, quantity, stamp, delta));
      taker.quantityRemaining = taker.quantityRemaining.minus(quantity);
    }

    return fills;
  }

  /**
   * Defensive pass: while best bid >= best ask, the earlier-entered of the
   * two head orders is treated as the maker and sets the price.
   */
  private uncross(stamp: EventStamp, delta: DeltaRecorder): Fill[] {
    const fills: Fill[] = [];
    for (;;) {
      const bidLevel = this.book.best("BUY");
      const askLevel = this.book.best("SELL");
      if (!bidLevel || !askLevel || bidLevel.price.lt(askLevel.price)) break;

      const bid = bidLevel.orders[0];
      const ask = askLevel.orders[0];
      const [maker, taker] = compareEntry(bid, ask) <= 0 ? [bid, ask] : [ask, bid];
      const quantity = Decimal.min(maker.quantityRemaining, taker.quantityRemaining);

      fills.push(this.execute(maker, taker, quantity, stamp, delta));
      this.book.reduce(taker, quantity);
      delta.reduced(taker, quantity);
      this.settleStatus(taker);
    }

    if (fills.length > 0) {
      this.logger.logCrossedBookResolved(toContext(stamp), fills.length);
    }
    return fills;
  }

  /**
   * Trade `quantity` between a resting maker and the taker at the maker's
   * price. The maker's book entry is reduced here; the taker's remaining
   * quantity is the caller's to update.
   */
  private execute(
    maker: Order,
    taker: Order,
    quantity: Decimal,
    stamp: EventStamp,
    delta: DeltaRecorder
  ): Fill {
    this.fillIdCounter++;
    const [buy, sell] = maker.side === "BUY" ? [maker, taker] : [taker, maker];
    const fill: Fill = {
      fillId: formatId("FIL", this.fillIdCounter),
      makerOrderId: maker.orderId,
      takerOrderId: taker.orderId,
      buyOrderId: buy.orderId,
      sellOrderId: sell.orderId,
      buyer: buy.owner,
      seller: sell.owner,
      price: maker.price,
      quantity,
      timestamp: stamp.timestamp,
    };

    this.book.reduce(maker, quantity);
    delta.reduced(maker, quantity);
    this.settleStatus(maker);
    this.logger.logFill(toContext(stamp), fill);
    return fill;
  }

  private settleStatus(order: Order): void {
    if (order.quantityRemaining.isZero()) {
      order.status = "FILLED";
      this.terminal.set(order.orderId, "FILLED");
    } else {
      order.status = "PARTIALLY_FILLED";
    }
  }

  private createOrder(request: OrderRequest, stamp: EventStamp): Order {
    const orderId = request.orderId ?? this.nextOrderId();
    if (this.book.get(orderId) || this.terminal.has(orderId)) {
      throw new InvalidOrderError(`Duplicate order id ${orderId}`, orderId);
    }
    const { owner, side, price, quantity } = normalizeIntent(request, orderId);

    return {
      orderId,
      owner,
      side,
      price,
      quantityOriginal: quantity,
      quantityRemaining: quantity,
      entryTimestamp: stamp.timestamp,
      entrySequence: stamp.sequence,
      status: "RESTING",
    };
  }

  private reject(ctx: LogContext, request: OrderRequest, err: InvalidOrderError): SubmitResult {
    const orderId = err.orderId ?? request.orderId ?? "";
    if (orderId !== "" && !this.book.get(orderId) && !this.terminal.has(orderId)) {
      this.terminal.set(orderId, "REJECTED");
    }
    this.logger.logOrderRejected(ctx, String(request.owner), err.message, orderId);
    return {
      accepted: false,
      orderId,
      status: "REJECTED",
      fills: [],
      delta: emptyDelta(),
      rejection: err,
    };
  }

  private nextOrderId(): string {
    this.orderIdCounter++;
    return formatId("ORD", this.orderIdCounter);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isMarketable(side: Side, limit: Decimal, oppositeBest: Decimal): boolean {
  return side === "BUY" ? limit.gte(oppositeBest) : limit.lte(oppositeBest);
}

export interface NormalizedIntent {
  owner: string;
  side: Side;
  price: Decimal;
  quantity: Decimal;
}

/**
 * Validate an intent before it touches the book. Throws InvalidOrderError
 * for a missing owner, an unknown side, a non-positive price or quantity, or
 * one with more significant digits than Decimal arithmetic keeps.
 */
export function normalizeIntent(intent: OrderIntent, orderId?: string): NormalizedIntent {
  if (typeof intent.owner !== "string" || intent.owner.length === 0) {
    throw new InvalidOrderError("Owner is required", orderId);
  }
  if (!isSide(intent.side)) {
    throw new InvalidOrderError(`Invalid side ${String(intent.side)}`, orderId);
  }
  return {
    owner: intent.owner,
    side: intent.side,
    price: parsePositive(intent.price, "Price", orderId),
    quantity: parsePositive(intent.quantity, "Quantity", orderId),
  };
}

function parsePositive(value: OrderIntent["price"], label: string, orderId?: string): Decimal {
  let parsed: Decimal;
  try {
    parsed = toDecimal(value);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InvalidOrderError(`${label} is not a number: ${detail}`, orderId);
  }
  if (!parsed.isFinite() || parsed.lte(0)) {
    throw new InvalidOrderError(`${label} must be positive, got ${parsed.toString()}`, orderId);
  }
  // Wider values would be rounded by book arithmetic.
  if (parsed.sd() > DECIMAL_PRECISION) {
    throw new InvalidOrderError(
      `${label} exceeds ${DECIMAL_PRECISION} significant digits, got ${parsed.toString()}`,
      orderId
    );
  }
  return parsed;
}

function toContext(stamp: EventStamp): LogContext {
  return { time: stamp.timestamp, eventId: stamp.eventId };
}
