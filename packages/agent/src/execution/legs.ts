import type { Leg, LegState, OrderAction, Side } from "../types.js";
import type { OrderStatusResult } from "../venues/types.js";
import { ArbitrageEngineError } from "../errors.js";

export type LegEvent =
  | { type: "submitted"; orderId: string; at: number }
  | { type: "rejected"; reason: string; orderId?: string }
  | { type: "status"; status: OrderStatusResult }
  | { type: "timeout"; filledSize: number; avgFillPrice: bigint };

export interface LegRequest {
  venue: string;
  marketId: string;
  side: Side;
  action: OrderAction;
  price: bigint;
  size: number;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function createLeg(id: string, req: LegRequest): Leg {
  return {
    id,
    venue: req.venue,
    marketId: req.marketId,
    side: req.side,
    action: req.action,
    requestedPrice: req.price,
    requestedSize: req.size,
    state: { kind: "Pending" },
    filledSize: 0,
    avgFillPrice: 0n,
  };
}

export function isLegTerminal(state: LegState): boolean {
  switch (state.kind) {
    case "Pending":
    case "Submitted":
    case "PartiallyFilled":
      return false;
    case "Filled":
    case "Rejected":
    case "TimedOut":
      return true;
    default:
      return assertNever(state);
  }
}

function invalid(leg: Leg, event: LegEvent): never {
  throw new ArbitrageEngineError(
    `Invalid leg transition: ${leg.state.kind} on ${event.type}`,
    "INVALID_LEG_TRANSITION",
    { legId: leg.id, venue: leg.venue, marketId: leg.marketId },
  );
}

/** Map a venue order status onto the leg while the order is live. */
function applyStatus(leg: Leg, orderId: string, status: OrderStatusResult): Leg {
  const fill = { filledSize: status.filledSize, avgFillPrice: status.avgFillPrice };
  switch (status.status) {
    case "FILLED":
      return { ...leg, ...fill, orderId, state: { kind: "Filled", orderId, ...fill } };
    case "OPEN":
    case "PARTIALLY_FILLED":
      if (status.filledSize === 0) return leg;
      return { ...leg, ...fill, orderId, state: { kind: "PartiallyFilled", orderId, ...fill } };
    case "CANCELLED":
    case "EXPIRED":
    case "REJECTED":
      // the venue closed the order; any partial fill is kept
      if (status.filledSize > 0) {
        return { ...leg, ...fill, orderId, state: { kind: "PartiallyFilled", orderId, ...fill } };
      }
      return { ...leg, orderId, state: { kind: "Rejected", reason: status.status.toLowerCase(), orderId } };
    default:
      return assertNever(status.status);
  }
}

/**
 * Pending → Submitted → { Filled | PartiallyFilled | Rejected | TimedOut }.
 * Returns a new Leg; terminal states accept no further events.
 */
export function transitionLeg(leg: Leg, event: LegEvent): Leg {
  const state = leg.state;
  switch (state.kind) {
    case "Pending":
      if (event.type === "submitted") {
        return {
          ...leg,
          orderId: event.orderId,
          state: { kind: "Submitted", orderId: event.orderId, submittedAt: event.at },
        };
      }
      if (event.type === "rejected") {
        return { ...leg, orderId: event.orderId, state: { kind: "Rejected", reason: event.reason, orderId: event.orderId } };
      }
      if (event.type === "timeout") {
        return { ...leg, state: { kind: "TimedOut", filledSize: 0, avgFillPrice: 0n } };
      }
      return invalid(leg, event);

    case "Submitted":
    case "PartiallyFilled":
      if (event.type === "status") return applyStatus(leg, state.orderId, event.status);
      if (event.type === "timeout") {
        return {
          ...leg,
          filledSize: event.filledSize,
          avgFillPrice: event.avgFillPrice,
          state: {
            kind: "TimedOut",
            orderId: state.orderId,
            filledSize: event.filledSize,
            avgFillPrice: event.avgFillPrice,
          },
        };
      }
      return invalid(leg, event);

    case "Filled":
    case "Rejected":
    case "TimedOut":
      return invalid(leg, event);

    default:
      return assertNever(state);
  }
}

/** True when the order is closed at the venue, whatever the fill. */
export function isOrderClosed(leg: Leg, status: OrderStatusResult): boolean {
  return leg.state.kind === "Filled" || status.status === "CANCELLED" ||
    status.status === "EXPIRED" || status.status === "REJECTED";
}

export function isFullyFilled(leg: Leg): boolean {
  return leg.filledSize >= leg.requestedSize && leg.requestedSize > 0;
}
