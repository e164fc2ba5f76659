import type { Leg, Market } from "../types.js";
import type { OrderStatusResult, VenueAdapter } from "../venues/types.js";
import { createLeg, isLegTerminal, isOrderClosed, transitionLeg } from "./legs.js";
import { getErrorMessage, isTransientVenueError, RejectedOrderError } from "../errors.js";
import { sleep, withTimeout } from "../retry.js";
import { log } from "../logger.js";

export interface LegTiming {
  /** Budget for the order to fill after submission */
  legTimeoutMs: number;
  fillPollIntervalMs: number;
  /** Bound on each individual venue call */
  venueCallTimeoutMs: number;
}

// ---------------------------------------------------------------------------
// Submit
// ---------------------------------------------------------------------------

export async function submitLeg(adapter: VenueAdapter, leg: Leg, timing: LegTiming): Promise<Leg> {
  try {
    const result = await withTimeout(
      adapter.submitOrder({
        marketId: leg.marketId,
        side: leg.side,
        action: leg.action,
        price: leg.requestedPrice,
        size: leg.requestedSize,
      }),
      timing.venueCallTimeoutMs,
      `${adapter.name} submitOrder`,
      adapter.name,
    );
    if (!result.success || !result.orderId) {
      throw new RejectedOrderError(result.error ?? "rejected by venue", leg.venue, leg.marketId);
    }
    return transitionLeg(leg, { type: "submitted", orderId: result.orderId, at: Date.now() });
  } catch (err) {
    // the order may have reached the venue; record it as timed out, not as never placed
    if (isTransientVenueError(err)) {
      log.error("Order submission outcome unknown", {
        venue: leg.venue,
        marketId: leg.marketId,
        legId: leg.id,
        error: getErrorMessage(err),
      });
      return transitionLeg(leg, { type: "timeout", filledSize: 0, avgFillPrice: 0n });
    }
    if (err instanceof RejectedOrderError) {
      log.warn("Order rejected", { legId: leg.id, reason: err.message, ...err.context });
    }
    return transitionLeg(leg, { type: "rejected", reason: getErrorMessage(err) });
  }
}

// ---------------------------------------------------------------------------
// Await fills
// ---------------------------------------------------------------------------

async function fetchStatus(adapter: VenueAdapter, orderId: string, timing: LegTiming): Promise<OrderStatusResult | null> {
  try {
    return await withTimeout(
      adapter.getOrderStatus(orderId),
      timing.venueCallTimeoutMs,
      `${adapter.name} getOrderStatus`,
      adapter.name,
    );
  } catch (err) {
    log.warn("Order status poll failed", { venue: adapter.name, orderId, error: getErrorMessage(err) });
    return null;
  }
}

/**
 * Poll a submitted leg until it fills, the venue closes it, or the leg
 * timeout passes. On timeout the order is cancelled and its final status
 * decides the recorded fill.
 */
export async function awaitLeg(adapter: VenueAdapter, submitted: Leg, timing: LegTiming): Promise<Leg> {
  const orderId = submitted.orderId;
  if (!orderId || isLegTerminal(submitted.state)) return submitted;

  let leg = submitted;
  const deadline = Date.now() + timing.legTimeoutMs;

  while (Date.now() < deadline) {
    const status = await fetchStatus(adapter, orderId, timing);
    if (status) {
      leg = transitionLeg(leg, { type: "status", status });
      if (isOrderClosed(leg, status)) return leg;
    }
    await sleep(timing.fillPollIntervalMs);
  }

  log.warn("Leg fill timeout, cancelling", {
    venue: leg.venue,
    marketId: leg.marketId,
    orderId,
    filledSize: leg.filledSize,
  });

  try {
    await withTimeout(adapter.cancelOrder(orderId), timing.venueCallTimeoutMs, `${adapter.name} cancelOrder`, adapter.name);
  } catch (err) {
    log.error("Cancel failed after leg timeout", { venue: leg.venue, orderId, error: getErrorMessage(err) });
  }

  const final = await fetchStatus(adapter, orderId, timing);
  if (final?.status === "FILLED") {
    return transitionLeg(leg, { type: "status", status: final });
  }
  return transitionLeg(leg, {
    type: "timeout",
    filledSize: final?.filledSize ?? leg.filledSize,
    avgFillPrice: final?.avgFillPrice ?? leg.avgFillPrice,
  });
}

export async function runLeg(adapter: VenueAdapter, leg: Leg, timing: LegTiming): Promise<Leg> {
  const submitted = await submitLeg(adapter, leg, timing);
  return awaitLeg(adapter, submitted, timing);
}

// ---------------------------------------------------------------------------
// Compensation
// ---------------------------------------------------------------------------

export interface UnwindTarget {
  venue: string;
  marketId: string;
  side: Leg["side"];
  size: number;
}

/**
 * SELL `size` contracts at the current best bid, falling back to one tick
 * when the bid is unknown or empty.
 */
export async function unwindLeg(
  adapter: VenueAdapter,
  target: UnwindTarget,
  market: Market | undefined,
  legId: string,
  timing: LegTiming,
): Promise<Leg> {
  let price = market?.tickSize ?? 0n;
  try {
    const quote = await withTimeout(
      adapter.getQuote(target.marketId, target.side),
      timing.venueCallTimeoutMs,
      `${adapter.name} getQuote`,
      adapter.name,
    );
    if (quote.bestBid > 0n) price = quote.bestBid;
  } catch (err) {
    log.warn("Unwind quote unavailable, selling at one tick", {
      venue: target.venue,
      marketId: target.marketId,
      error: getErrorMessage(err),
    });
  }

  const leg = createLeg(legId, {
    venue: target.venue,
    marketId: target.marketId,
    side: target.side,
    action: "SELL",
    price,
    size: target.size,
  });
  log.info("Unwinding excess fill", {
    venue: target.venue,
    marketId: target.marketId,
    side: target.side,
    size: target.size,
    price,
  });
  return runLeg(adapter, leg, timing);
}
