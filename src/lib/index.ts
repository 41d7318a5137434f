export { CORE_STREAMS, MarketSimulation } from "./simulation";
export type {
  CancelResponse,
  Dispatch,
  EventListener,
  ExternalEventDraft,
  RunOptions,
  SubmitResponse,
} from "./simulation";

export { DEFAULT_SIMULATION_CONFIG, resolveConfig } from "./config";
export type { AccountConfig, LatencyConfig, SimulationConfig, SimulationConfigInput } from "./config";

export { SeededRNG, StreamManager, deriveRepetitionSeed, repetitionSeeds } from "./rng";

export { EventLog, EventScheduler } from "./clock";
export { EVENT_KINDS, compareEvents, createEvent, replayEvents, serializeEvents } from "./events";
export type { AckPayload, AnySimEvent, EventDraft, EventKind, EventPayloads, SimEvent } from "./events";

export { OrderBook } from "./orderbook";
export type { BookSnapshot, LevelSnapshot, PriceLevel } from "./orderbook";
export { FifoTieBreak, MatchingEngine, RandomTieBreak, isMarketable, normalizeIntent } from "./matching";
export type {
  BookDelta,
  CancelResult,
  LevelChange,
  OrderRequest,
  SubmitResult,
  TieBreakPolicy,
  TieBreakPolicyName,
} from "./matching";

export { AccountingLedger, assertZeroSum } from "./ledger";
export type { AccountSnapshot, PnlMethod, ReconciliationReport } from "./ledger";

export { EventProcessor, acknowledgement } from "./processor";
export type { DispatchOutcome } from "./processor";
export { assertSameRun, diffValues, replayEventLog, verifyReplay } from "./replay";
export type { ReplayResult, RunState } from "./replay";

export { ConstantLatency, JitteredLatency } from "./latency";
export type { LatencyModel } from "./latency";

export { SimLogger } from "./logger";
export type { LogContext, SimLogEntry, SimLogType } from "./logger";

export { SIDES, compareEntry, oppositeSide } from "./engine-common";
export type { EventStamp, Fill, Order, OrderIntent, OrderStatus, Side } from "./engine-common";

export {
  AccountingInvariantError,
  ConfigurationError,
  InvalidOrderError,
  OrderNotFoundError,
  ReplayDivergenceError,
  SimulationError,
} from "./errors";
export type { SimulationErrorCode } from "./errors";

export { toDecimal } from "./numeric";
export type { DecimalInput } from "./numeric";
