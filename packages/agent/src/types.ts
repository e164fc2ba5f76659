export type Side = "YES" | "NO";

export type OrderAction = "BUY" | "SELL";

export type StrategyKind = "CrossPlatform" | "SinglePlatformHedge";

/** Weak reference to a catalog market; always re-resolved through MarketCatalog. */
export interface MarketRef {
  venue: string;
  marketId: string;
}

export type MarketStatus =
  | { kind: "Open" }
  | { kind: "Closed" }
  | { kind: "Resolved"; outcome: Side };

export interface Market {
  venue: string;
  marketId: string;
  question: string;
  outcomeLabels: [string, string]; // [yesLabel, noLabel]
  tickSize: bigint; // 1e18
  expiresAt: number;
  status: MarketStatus;
  slug?: string;
  category?: string;
}

export type PairPolarity = "aligned" | "inverted";

export type RetractReason =
  | "market_closed"
  | "market_resolved"
  | "market_missing"
  | "below_threshold"
  | "superseded";

export interface MatchedPair {
  id: string;
  marketA: MarketRef;
  marketB: MarketRef;
  score: number;
  textSimilarity: number;
  /** aligned: YES on A asserts the same thing as YES on B. inverted: YES on A = NO on B. */
  polarity: PairPolarity;
  confirmed: boolean;
  retractedReason?: RetractReason;
  updatedAt: number;
}

export interface PriceQuote {
  venue: string;
  marketId: string;
  side: Side;
  bestBid: bigint; // 1e18
  bestAsk: bigint; // 1e18
  bidSize: number;
  askSize: number;
  timestamp: number;
}

export interface OpportunityLeg {
  venue: string;
  marketId: string;
  side: Side;
  targetPrice: bigint;
  targetSize: number;
}

export interface Opportunity {
  id: string;
  /** Dedup key: the pair id for cross-platform, venue:marketId for hedges. */
  key: string;
  strategy: StrategyKind;
  legs: OpportunityLeg[];
  totalCost: bigint; // sum of leg asks per contract
  buffer: bigint;
  margin: bigint; // ONE - totalCost - buffer, always > 0
  expectedProfit: bigint; // margin * size
  detectedAt: number;
  expiresAt: number; // oldest underlying quote + staleness bound
}

// --- Leg state machine ---

export type LegState =
  | { kind: "Pending" }
  | { kind: "Submitted"; orderId: string; submittedAt: number }
  | { kind: "PartiallyFilled"; orderId: string; filledSize: number; avgFillPrice: bigint }
  | { kind: "Filled"; orderId: string; filledSize: number; avgFillPrice: bigint }
  | { kind: "Rejected"; reason: string; orderId?: string }
  | { kind: "TimedOut"; orderId?: string; filledSize: number; avgFillPrice: bigint };

export type LegStateKind = LegState["kind"];

export interface Leg {
  id: string;
  venue: string;
  marketId: string;
  side: Side;
  action: OrderAction;
  requestedPrice: bigint;
  requestedSize: number;
  state: LegState;
  orderId?: string;
  filledSize: number;
  avgFillPrice: bigint;
}

// --- Positions ---

export type SettlementState =
  | { kind: "Open" }
  | { kind: "AwaitingSettlement"; since: number }
  | { kind: "Settled"; payout: bigint; settledAt: number }
  | { kind: "Abandoned"; reason: string; abandonedAt: number };

export interface UnhedgedExposure {
  venue: string;
  marketId: string;
  side: Side;
  size: number;
  reason: string;
  flaggedAt: number;
}

export interface Position {
  id: string;
  opportunityId: string;
  strategy: StrategyKind;
  legs: Leg[];
  /** Compensating SELL legs placed to flatten excess fills. */
  unwinds: Leg[];
  costBasis: bigint;
  /** Contracts held on every leg, i.e. the quantity with a guaranteed payout. */
  hedgedSize: number;
  realizedPnl: bigint;
  unrealizedPnl: bigint;
  exposure?: UnhedgedExposure;
  settlement: SettlementState;
  openedAt: number;
}

export interface ExposureSummary {
  venue: string;
  committed: bigint;
  contracts: number;
  openPositions: number;
  unhedgedContracts: number;
}

export interface PositionStatistics {
  totalPositions: number;
  openPositions: number;
  awaitingSettlement: number;
  settledPositions: number;
  /** Settled with payout above cost basis */
  wonPositions: number;
  lostPositions: number;
  abandonedPositions: number;
  flaggedPositions: number;
  committedCapital: bigint;
  realizedPnl: bigint;
  unrealizedPnl: bigint;
  /** Keyed by venue; cross-platform positions are keyed "venueA+venueB" */
  realizedPnlByVenue: Record<string, bigint>;
}

// --- Execution outcomes ---

export type SkipReason =
  | "paused"
  | "expired"
  | "locked"
  | "stale_quotes"
  | "margin_collapsed"
  | "capacity"
  | "size_too_small"
  | "venue_unavailable";

export type ExecutionOutcome =
  | { kind: "executed"; position: Position }
  | { kind: "unwound"; position: Position }
  | { kind: "unhedged"; position: Position }
  | { kind: "failed"; legs: Leg[]; error: string }
  | { kind: "skipped"; reason: SkipReason; detail?: string };

export interface AgentStatus {
  running: boolean;
  startedAt: number;
  lastCatalogRefresh: number;
  activePairs: number;
  quotesTracked: number;
  crossCycles: number;
  hedgeCycles: number;
  tradesExecuted: number;
  crossPaused: boolean;
  hedgePaused: boolean;
  /** Why a strategy is paused; absent while it runs */
  crossPauseReason?: string;
  hedgePauseReason?: string;
  statistics: PositionStatistics;
}
