/**
 * Simulation configuration
 */

import { ConfigurationError } from "./errors";
import type { PnlMethod } from "./ledger";
import type { TieBreakPolicyName } from "./matching";
import { toDecimal } from "./numeric";
import type { DecimalInput } from "./numeric";

export interface AccountConfig {
  owner: string;
  cash?: DecimalInput;
  inventory?: DecimalInput;
  /** Per-unit cost of the opening inventory, for realized P&L. */
  costBasis?: DecimalInput;
}

export interface LatencyConfig {
  /** ms from submit() to the ORDER/CANCEL event */
  submissionDelay: number;
  /** ms from processing an ORDER/CANCEL to its ACK event */
  ackDelay: number;
  /** ms from a match to its FILL event */
  fillDelay: number;
  /** Upper bound of the uniform jitter added to both delays (0 = none) */
  jitter: number;
}

export interface SimulationConfig {
  /** Root seed of the run */
  seed: number;
  /** Clock origin in ms */
  startTime: number;
  /** Opening balances */
  accounts: AccountConfig[];
  latency: LatencyConfig;
  /** Fixed for the whole run */
  pnlMethod: PnlMethod;
  tieBreak: TieBreakPolicyName;
}

export type SimulationConfigInput = Partial<Omit<SimulationConfig, "seed" | "latency">> & {
  seed: number;
  latency?: Partial<LatencyConfig>;
};

export const DEFAULT_SIMULATION_CONFIG: Omit<SimulationConfig, "seed"> = {
  startTime: 0,
  accounts: [],
  latency: { submissionDelay: 0, ackDelay: 0, fillDelay: 0, jitter: 0 },
  pnlMethod: "AVERAGE_COST",
  tieBreak: "FIFO",
};

function assertNonNegativeInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${label} must be a non-negative integer, got ${value}`);
  }
}

function assertFiniteDecimal(value: DecimalInput, label: string): void {
  let ok: boolean;
  try {
    ok = toDecimal(value).isFinite();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${label} is not a number: ${detail}`);
  }
  if (!ok) {
    throw new ConfigurationError(`${label} must be finite`);
  }
}

/**
 * Fill in defaults and validate. Throws ConfigurationError before any
 * component is built.
 */
export function resolveConfig(input: SimulationConfigInput): SimulationConfig {
  const config: SimulationConfig = {
    seed: input.seed,
    startTime: input.startTime ?? DEFAULT_SIMULATION_CONFIG.startTime,
    accounts: (input.accounts ?? DEFAULT_SIMULATION_CONFIG.accounts).map((a) => ({ ...a })),
    latency: { ...DEFAULT_SIMULATION_CONFIG.latency, ...input.latency },
    pnlMethod: input.pnlMethod ?? DEFAULT_SIMULATION_CONFIG.pnlMethod,
    tieBreak: input.tieBreak ?? DEFAULT_SIMULATION_CONFIG.tieBreak,
  };

  assertNonNegativeInteger(config.seed, "seed");
  assertNonNegativeInteger(config.startTime, "startTime");
  assertNonNegativeInteger(config.latency.submissionDelay, "latency.submissionDelay");
  assertNonNegativeInteger(config.latency.ackDelay, "latency.ackDelay");
  assertNonNegativeInteger(config.latency.fillDelay, "latency.fillDelay");
  assertNonNegativeInteger(config.latency.jitter, "latency.jitter");

  if (config.pnlMethod !== "AVERAGE_COST" && config.pnlMethod !== "FIFO") {
    throw new ConfigurationError(`Unknown pnlMethod ${String(config.pnlMethod)}`);
  }
  if (config.tieBreak !== "FIFO" && config.tieBreak !== "RANDOM") {
    throw new ConfigurationError(`Unknown tieBreak ${String(config.tieBreak)}`);
  }

  const owners = new Set<string>();
  for (const account of config.accounts) {
    if (typeof account.owner !== "string" || account.owner.length === 0) {
      throw new ConfigurationError("Account owner must be a non-empty string");
    }
    if (owners.has(account.owner)) {
      throw new ConfigurationError(`Duplicate account ${account.owner}`);
    }
    owners.add(account.owner);
    assertFiniteDecimal(account.cash ?? 0, `accounts.${account.owner}.cash`);
    assertFiniteDecimal(account.inventory ?? 0, `accounts.${account.owner}.inventory`);
    assertFiniteDecimal(account.costBasis ?? 0, `accounts.${account.owner}.costBasis`);
  }

  return config;
}
