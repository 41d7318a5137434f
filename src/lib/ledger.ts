/**
 * Accounting Ledger
 *
 * Converts fills into per-participant cash and inventory. Every fill must be
 * an exact zero-sum transfer: the buyer pays what the seller receives and
 * receives what the seller delivers. Any breach is fatal and carries the
 * offending fill/event ids.
 *
 * Realized P&L uses one convention for the whole run, either average cost or
 * FIFO lots. Both handle short inventory and position flips.
 */

import { Decimal } from "decimal.js";
import type { Fill } from "./engine-common";
import { AccountingInvariantError, ConfigurationError } from "./errors";
import { SimLogger } from "./logger";
import { ZERO, sumDecimals, toDecimal } from "./numeric";
import type { DecimalInput } from "./numeric";

// ============================================================================
// Types
// ============================================================================

export type PnlMethod = "AVERAGE_COST" | "FIFO";

export interface AccountSnapshot {
  readonly owner: string;
  readonly cash: Decimal;
  readonly inventory: Decimal;
  readonly realizedPnl: Decimal;
  /** Cost of the open position per unit; undefined when flat. */
  readonly averageCost?: Decimal;
  readonly openingCash: Decimal;
  readonly openingInventory: Decimal;
  readonly fillCount: number;
}

export interface ReconciliationReport {
  accounts: number;
  fills: number;
  totalCashDelta: Decimal;
  totalInventoryDelta: Decimal;
}

interface JournalEntry {
  fillId: string;
  eventId?: string;
  buyer: string;
  seller: string;
  cashDeltas: [Decimal, Decimal];
  inventoryDeltas: [Decimal, Decimal];
}

// ============================================================================
// Realized P&L trackers
// ============================================================================

interface PnlTracker {
  /** Apply a signed quantity (buys positive) and return the P&L it realizes. */
  trade(signedQuantity: Decimal, price: Decimal): Decimal;
  averageCost(): Decimal | undefined;
}

class AverageCostTracker implements PnlTracker {
  private position: Decimal;
  private cost: Decimal;

  constructor(openingInventory: Decimal, costBasis: Decimal) {
    this.position = openingInventory;
    this.cost = openingInventory.isZero() ? ZERO : costBasis;
  }

  trade(signedQuantity: Decimal, price: Decimal): Decimal {
    const q = this.position;
    let realized = ZERO;

    if (q.isZero() || q.isPositive() === signedQuantity.isPositive()) {
      const size = q.abs().plus(signedQuantity.abs());
      this.cost = q.abs().times(this.cost).plus(signedQuantity.abs().times(price)).div(size);
    } else {
      const closed = Decimal.min(q.abs(), signedQuantity.abs());
      const direction = q.isPositive() ? 1 : -1;
      realized = price.minus(this.cost).times(closed).times(direction);
      if (signedQuantity.abs().gt(closed)) {
        this.cost = price;
      }
    }

    this.position = q.plus(signedQuantity);
    if (this.position.isZero()) this.cost = ZERO;
    return realized;
  }

  averageCost(): Decimal | undefined {
    return this.position.isZero() ? undefined : this.cost;
  }
}

interface Lot {
  quantity: Decimal;
  price: Decimal;
}

class FifoLotTracker implements PnlTracker {
  /** Open lots, oldest first; all share the sign of `long`. */
  private readonly lots: Lot[] = [];
  private long = true;

  constructor(openingInventory: Decimal, costBasis: Decimal) {
    if (!openingInventory.isZero()) {
      this.long = openingInventory.isPositive();
      this.lots.push({ quantity: openingInventory.abs(), price: costBasis });
    }
  }

  trade(signedQuantity: Decimal, price: Decimal): Decimal {
    const buying = signedQuantity.isPositive();
    let remaining = signedQuantity.abs();
    let realized = ZERO;

    if (this.lots.length === 0 || buying === this.long) {
      this.long = buying;
      this.lots.push({ quantity: remaining, price });
      return realized;
    }

    const direction = this.long ? 1 : -1;
    while (remaining.gt(0) && this.lots.length > 0) {
      const lot = this.lots[0];
      const take = Decimal.min(lot.quantity, remaining);
      realized = realized.plus(price.minus(lot.price).times(take).times(direction));
      lot.quantity = lot.quantity.minus(take);
      remaining = remaining.minus(take);
      if (lot.quantity.isZero()) this.lots.shift();
    }

    if (remaining.gt(0)) {
      this.long = buying;
      this.lots.push({ quantity: remaining, price });
    }
    return realized;
  }

  averageCost(): Decimal | undefined {
    if (this.lots.length === 0) return undefined;
    const size = sumDecimals(this.lots.map((l) => l.quantity));
    return sumDecimals(this.lots.map((l) => l.quantity.times(l.price))).div(size);
  }
}

// ============================================================================
// Invariant helpers
// ============================================================================

/**
 * Throw unless `deltas` net to exactly zero.
 */
export function assertZeroSum(
  check: string,
  deltas: readonly Decimal[],
  eventIds: readonly string[]
): void {
  const drift = sumDecimals(deltas);
  if (!drift.isZero()) {
    throw new AccountingInvariantError(`${check} drifted by ${drift.toString()}`, eventIds, check);
  }
}

// ============================================================================
// Ledger
// ============================================================================

interface Balance {
  cash: Decimal;
  inventory: Decimal;
}

interface AccountState extends Balance {
  owner: string;
  realizedPnl: Decimal;
  openingCash: Decimal;
  openingInventory: Decimal;
  fillCount: number;
  tracker: PnlTracker;
}

export interface AccountingLedgerOptions {
  pnlMethod?: PnlMethod;
  logger?: SimLogger;
}

export class AccountingLedger {
  readonly pnlMethod: PnlMethod;
  private readonly accounts = new Map<string, AccountState>();
  private readonly journal: JournalEntry[] = [];
  private readonly appliedFillIds = new Set<string>();
  private readonly logger: SimLogger;
  private lastTime = 0;

  constructor(options: AccountingLedgerOptions = {}) {
    this.pnlMethod = options.pnlMethod ?? "AVERAGE_COST";
    this.logger = options.logger ?? new SimLogger();
  }

  /**
   * Open an account with its starting balances. `costBasis` prices any
   * opening inventory for realized P&L.
   */
  openAccount(
    owner: string,
    cash: DecimalInput = 0,
    inventory: DecimalInput = 0,
    costBasis: DecimalInput = 0
  ): AccountSnapshot {
    if (owner.length === 0) {
      throw new ConfigurationError("Account owner must be non-empty");
    }
    if (this.accounts.has(owner)) {
      throw new ConfigurationError(`Account ${owner} already exists`);
    }
    if (this.journal.length > 0) {
      throw new ConfigurationError(`Cannot open account ${owner} after fills were applied`);
    }
    const state = this.createAccount(owner, toDecimal(cash), toDecimal(inventory), toDecimal(costBasis));
    return toSnapshot(state);
  }

  /**
   * Apply one fill to both counterparties. Every check runs against the
   * would-be balances first; a refused fill leaves the ledger untouched.
   */
  apply(fill: Fill, eventId?: string): void {
    const ids = eventId ? [fill.fillId, eventId] : [fill.fillId];
    this.validate(fill, ids);

    const notional = fill.price.times(fill.quantity);
    const entry: JournalEntry = {
      fillId: fill.fillId,
      eventId,
      buyer: fill.buyer,
      seller: fill.seller,
      cashDeltas: [notional.negated(), notional],
      inventoryDeltas: [fill.quantity, fill.quantity.negated()],
    };
    assertZeroSum("cash_transfer", entry.cashDeltas, ids);
    assertZeroSum("inventory_transfer", entry.inventoryDeltas, ids);

    // A self-trade touches one owner twice, so legs accumulate per owner.
    const next = new Map<string, Balance>();
    const legs: Array<[string, 0 | 1]> = [
      [fill.buyer, 0],
      [fill.seller, 1],
    ];
    for (const [owner, leg] of legs) {
      const current = next.get(owner) ?? this.balance(owner);
      next.set(owner, {
        cash: current.cash.plus(entry.cashDeltas[leg]),
        inventory: current.inventory.plus(entry.inventoryDeltas[leg]),
      });
    }

    const after: Balance[] = [
      ...[...this.accounts.values()].filter((a) => !next.has(a.owner)),
      ...next.values(),
    ];
    assertZeroSum(
      "cash_conservation",
      [sumDecimals(after.map((b) => b.cash)), this.totalCash().negated()],
      ids
    );
    assertZeroSum(
      "inventory_conservation",
      [sumDecimals(after.map((b) => b.inventory)), this.totalInventory().negated()],
      ids
    );

    for (const [owner, balance] of next) {
      const account = this.accountFor(owner);
      account.cash = balance.cash;
      account.inventory = balance.inventory;
    }
    const buyer = this.accountFor(fill.buyer);
    buyer.realizedPnl = buyer.realizedPnl.plus(buyer.tracker.trade(fill.quantity, fill.price));
    buyer.fillCount++;
    const seller = this.accountFor(fill.seller);
    seller.realizedPnl = seller.realizedPnl.plus(
      seller.tracker.trade(fill.quantity.negated(), fill.price)
    );
    if (seller !== buyer) seller.fillCount++;

    this.journal.push(entry);
    this.appliedFillIds.add(fill.fillId);
    this.lastTime = fill.timestamp;
    this.logger.logAccountUpdated({ time: fill.timestamp, eventId }, fill);
  }

  applyAll(fills: Iterable<Fill>): void {
    for (const fill of fills) {
      this.apply(fill);
    }
  }

  /**
   * End-of-run check: cash and inventory deltas across all accounts sum to
   * zero, and every account equals its opening balance plus its journal.
   */
  reconcile(): ReconciliationReport {
    const expected = new Map<string, { cash: Decimal; inventory: Decimal; ids: string[] }>();
    for (const account of this.accounts.values()) {
      expected.set(account.owner, {
        cash: account.openingCash,
        inventory: account.openingInventory,
        ids: [],
      });
    }

    for (const entry of this.journal) {
      const legs: Array<[string, 0 | 1]> = [
        [entry.buyer, 0],
        [entry.seller, 1],
      ];
      for (const [owner, leg] of legs) {
        const row = expected.get(owner);
        if (!row) {
          throw new AccountingInvariantError(
            `Journal references unknown account ${owner}`,
            [entry.fillId],
            "unknown_account"
          );
        }
        row.cash = row.cash.plus(entry.cashDeltas[leg]);
        row.inventory = row.inventory.plus(entry.inventoryDeltas[leg]);
        row.ids.push(entry.fillId);
      }
    }

    for (const account of this.accounts.values()) {
      const row = expected.get(account.owner);
      if (row && (!row.cash.eq(account.cash) || !row.inventory.eq(account.inventory))) {
        throw new AccountingInvariantError(
          `Account ${account.owner} does not match its journal`,
          row.ids.length > 0 ? row.ids : ["no-fills"],
          "journal_mismatch"
        );
      }
    }

    const all = [...this.accounts.values()];
    const totalCashDelta = sumDecimals(all.map((a) => a.cash.minus(a.openingCash)));
    const totalInventoryDelta = sumDecimals(all.map((a) => a.inventory.minus(a.openingInventory)));
    const imbalanced = this.journal
      .filter((e) => !sumDecimals(e.cashDeltas).isZero() || !sumDecimals(e.inventoryDeltas).isZero())
      .map((e) => e.fillId);
    const ids = imbalanced.length > 0 ? imbalanced : this.journal.map((e) => e.fillId);

    assertZeroSum("cash_reconciliation", [totalCashDelta], ids);
    assertZeroSum("inventory_reconciliation", [totalInventoryDelta], ids);

    this.logger.logReconciled({ time: this.lastTime }, this.accounts.size, this.journal.length);
    return {
      accounts: this.accounts.size,
      fills: this.journal.length,
      totalCashDelta,
      totalInventoryDelta,
    };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  snapshot(owner: string): AccountSnapshot | undefined {
    const account = this.accounts.get(owner);
    return account ? toSnapshot(account) : undefined;
  }

  /** Every account, ordered by owner. */
  snapshots(): AccountSnapshot[] {
    return [...this.accounts.values()]
      .sort((a, b) => (a.owner < b.owner ? -1 : a.owner > b.owner ? 1 : 0))
      .map(toSnapshot);
  }

  /**
   * Equity per owner at `markPrice` (cash + inventory * markPrice).
   */
  markToMarket(markPrice: DecimalInput): Map<string, Decimal> {
    const mark = toDecimal(markPrice);
    if (!mark.isFinite()) {
      throw new ConfigurationError("markPrice must be finite");
    }
    const equity = new Map<string, Decimal>();
    for (const account of this.accounts.values()) {
      equity.set(account.owner, account.cash.plus(account.inventory.times(mark)));
    }
    return equity;
  }

  /**
   * P&L per owner if the contract settles at `outcome` (0 or 1 for a binary
   * contract, or any price in between): change in cash plus change in
   * inventory valued at the outcome. Owners net to exactly zero.
   */
  settlementPnl(outcome: DecimalInput): Map<string, Decimal> {
    const value = toDecimal(outcome);
    if (!value.isFinite() || value.lt(0) || value.gt(1)) {
      throw new ConfigurationError(`Settlement outcome must be within [0, 1], got ${value.toString()}`);
    }

    const pnl = new Map<string, Decimal>();
    for (const account of this.accounts.values()) {
      const cashDelta = account.cash.minus(account.openingCash);
      const inventoryDelta = account.inventory.minus(account.openingInventory);
      pnl.set(account.owner, cashDelta.plus(inventoryDelta.times(value)));
    }

    const ids = this.journal.length > 0 ? this.journal.map((e) => e.fillId) : ["no-fills"];
    assertZeroSum("settlement_zero_sum", [...pnl.values()], ids);
    return pnl;
  }

  get processedFills(): number {
    return this.journal.length;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private validate(fill: Fill, ids: string[]): void {
    if (fill.fillId.length === 0) {
      throw new AccountingInvariantError("Fill without id", ids, "missing_fill_id");
    }
    if (this.appliedFillIds.has(fill.fillId)) {
      throw new AccountingInvariantError("Fill applied twice", ids, "duplicate_fill");
    }
    if (!fill.price.isFinite() || fill.price.lte(0)) {
      throw new AccountingInvariantError(
        `Fill price must be positive, got ${fill.price.toString()}`,
        ids,
        "invalid_fill_price"
      );
    }
    if (!fill.quantity.isFinite() || fill.quantity.lte(0)) {
      throw new AccountingInvariantError(
        `Fill quantity must be positive, got ${fill.quantity.toString()}`,
        ids,
        "invalid_fill_size"
      );
    }
  }

  private balance(owner: string): Balance {
    const account = this.accounts.get(owner);
    return account ? { cash: account.cash, inventory: account.inventory } : { cash: ZERO, inventory: ZERO };
  }

  private accountFor(owner: string): AccountState {
    return this.accounts.get(owner) ?? this.createAccount(owner);
  }

  private createAccount(
    owner: string,
    cash: Decimal = ZERO,
    inventory: Decimal = ZERO,
    costBasis: Decimal = ZERO
  ): AccountState {
    const tracker =
      this.pnlMethod === "FIFO"
        ? new FifoLotTracker(inventory, costBasis)
        : new AverageCostTracker(inventory, costBasis);
    const state: AccountState = {
      owner,
      cash,
      inventory,
      realizedPnl: ZERO,
      openingCash: cash,
      openingInventory: inventory,
      fillCount: 0,
      tracker,
    };
    this.accounts.set(owner, state);
    return state;
  }

  private totalCash(): Decimal {
    return sumDecimals([...this.accounts.values()].map((a) => a.cash));
  }

  private totalInventory(): Decimal {
    return sumDecimals([...this.accounts.values()].map((a) => a.inventory));
  }
}

function toSnapshot(account: AccountState): AccountSnapshot {
  return Object.freeze({
    owner: account.owner,
    cash: account.cash,
    inventory: account.inventory,
    realizedPnl: account.realizedPnl,
    averageCost: account.tracker.averageCost(),
    openingCash: account.openingCash,
    openingInventory: account.openingInventory,
    fillCount: account.fillCount,
  });
}
