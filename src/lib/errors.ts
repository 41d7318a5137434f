/**
 * Simulation error taxonomy
 *
 * Recoverable errors (invalid orders, unknown orders) reject one intent and
 * the run continues. Fatal errors (configuration, accounting invariants,
 * replay divergence) abort the run and are never retried.
 */

export type SimulationErrorCode =
  | "CONFIGURATION"
  | "INVALID_ORDER"
  | "ORDER_NOT_FOUND"
  | "ACCOUNTING_INVARIANT"
  | "REPLAY_DIVERGENCE";

export class SimulationError extends Error {
  constructor(
    public readonly code: SimulationErrorCode,
    message: string,
    public readonly fatal: boolean
  ) {
    super(message);
    this.name = "SimulationError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConfigurationError extends SimulationError {
  constructor(message: string) {
    super("CONFIGURATION", message, true);
    this.name = "ConfigurationError";
  }
}

export class InvalidOrderError extends SimulationError {
  constructor(
    message: string,
    public readonly orderId?: string
  ) {
    super("INVALID_ORDER", message, false);
    this.name = "InvalidOrderError";
  }
}

export class OrderNotFoundError extends SimulationError {
  constructor(public readonly orderId: string, reason = "unknown order") {
    super("ORDER_NOT_FOUND", `Order ${orderId} not found: ${reason}`, false);
    this.name = "OrderNotFoundError";
  }
}

/**
 * Raised on any zero-sum or reconciliation breach. Always carries the
 * fill/event ids that triggered it.
 */
export class AccountingInvariantError extends SimulationError {
  constructor(
    message: string,
    public readonly eventIds: readonly string[],
    public readonly check: string
  ) {
    super("ACCOUNTING_INVARIANT", `${message} [${eventIds.join(", ")}]`, true);
    this.name = "AccountingInvariantError";
  }
}

export class ReplayDivergenceError extends SimulationError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly eventId?: string
  ) {
    super(
      "REPLAY_DIVERGENCE",
      eventId ? `${message} at ${path} (event ${eventId})` : `${message} at ${path}`,
      true
    );
    this.name = "ReplayDivergenceError";
  }
}
