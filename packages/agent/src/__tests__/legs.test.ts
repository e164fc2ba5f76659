import { describe, it, expect } from "vitest";
import type { Leg } from "../types.js";
import type { OrderStatusResult } from "../venues/types.js";
import { createLeg, isFullyFilled, isLegTerminal, transitionLeg } from "../execution/legs.js";
import { MarketLocks } from "../execution/market-locks.js";
import { ArbitrageEngineError } from "../errors.js";
import { parseWad } from "../fixed-point.js";

function newLeg(): Leg {
  return createLeg("leg-1", {
    venue: "polymarket",
    marketId: "pm-1",
    side: "YES",
    action: "BUY",
    price: parseWad("0.40"),
    size: 10,
  });
}

function status(partial: Partial<OrderStatusResult>): OrderStatusResult {
  return {
    orderId: "o-1",
    status: "OPEN",
    filledSize: 0,
    remainingSize: 10,
    avgFillPrice: 0n,
    ...partial,
  };
}

function submitted(): Leg {
  return transitionLeg(newLeg(), { type: "submitted", orderId: "o-1", at: 100 });
}

describe("transitionLeg", () => {
  it("starts pending with nothing filled", () => {
    const leg = newLeg();
    expect(leg.state).toEqual({ kind: "Pending" });
    expect(leg.filledSize).toBe(0);
    expect(isLegTerminal(leg.state)).toBe(false);
  });

  it("moves to Submitted with the venue order id", () => {
    const leg = submitted();
    expect(leg.state).toEqual({ kind: "Submitted", orderId: "o-1", submittedAt: 100 });
    expect(leg.orderId).toBe("o-1");
  });

  it("fills completely on a FILLED status", () => {
    const leg = transitionLeg(submitted(), {
      type: "status",
      status: status({ status: "FILLED", filledSize: 10, remainingSize: 0, avgFillPrice: parseWad("0.40") }),
    });
    expect(leg.state.kind).toBe("Filled");
    expect(leg.filledSize).toBe(10);
    expect(isFullyFilled(leg)).toBe(true);
    expect(isLegTerminal(leg.state)).toBe(true);
  });

  it("stays Submitted while an open order has no fill", () => {
    const before = submitted();
    const after = transitionLeg(before, { type: "status", status: status({}) });
    expect(after).toBe(before);
  });

  it("records a partial fill and then completes it", () => {
    const partial = transitionLeg(submitted(), {
      type: "status",
      status: status({ status: "PARTIALLY_FILLED", filledSize: 4, remainingSize: 6, avgFillPrice: parseWad("0.40") }),
    });
    expect(partial.state).toEqual({
      kind: "PartiallyFilled",
      orderId: "o-1",
      filledSize: 4,
      avgFillPrice: parseWad("0.40"),
    });

    const filled = transitionLeg(partial, {
      type: "status",
      status: status({ status: "FILLED", filledSize: 10, remainingSize: 0, avgFillPrice: parseWad("0.40") }),
    });
    expect(filled.state.kind).toBe("Filled");
  });

  it("rejects a cancelled order with no fill", () => {
    const leg = transitionLeg(submitted(), { type: "status", status: status({ status: "CANCELLED" }) });
    expect(leg.state).toEqual({ kind: "Rejected", reason: "cancelled", orderId: "o-1" });
  });

  it("keeps the partial fill of a cancelled order", () => {
    const leg = transitionLeg(submitted(), {
      type: "status",
      status: status({ status: "CANCELLED", filledSize: 3, avgFillPrice: parseWad("0.41") }),
    });
    expect(leg.state.kind).toBe("PartiallyFilled");
    expect(leg.filledSize).toBe(3);
    expect(leg.avgFillPrice).toBe(parseWad("0.41"));
  });

  it("times out carrying the final fill", () => {
    const leg = transitionLeg(submitted(), { type: "timeout", filledSize: 2, avgFillPrice: parseWad("0.40") });
    expect(leg.state).toEqual({ kind: "TimedOut", orderId: "o-1", filledSize: 2, avgFillPrice: parseWad("0.40") });
    expect(leg.filledSize).toBe(2);
  });

  it("rejects directly from Pending", () => {
    const leg = transitionLeg(newLeg(), { type: "rejected", reason: "market not open" });
    expect(leg.state).toEqual({ kind: "Rejected", reason: "market not open", orderId: undefined });
  });

  it("refuses events on a terminal leg", () => {
    const rejected = transitionLeg(newLeg(), { type: "rejected", reason: "no" });
    expect(() => transitionLeg(rejected, { type: "submitted", orderId: "o-2", at: 1 })).toThrow(ArbitrageEngineError);
  });

  it("refuses a status update before submission", () => {
    expect(() => transitionLeg(newLeg(), { type: "status", status: status({}) })).toThrow(
      "Invalid leg transition: Pending on status",
    );
  });
});

describe("MarketLocks", () => {
  it("acquires all keys or none", () => {
    const locks = new MarketLocks();
    const release = locks.tryAcquire(["polymarket:pm-1", "kalshi:k-1"], "x-1");
    expect(release).not.toBeNull();

    expect(locks.tryAcquire(["kalshi:k-1", "kalshi:k-2"], "x-2")).toBeNull();
    expect(locks.isLocked("kalshi:k-2")).toBe(false);
    expect(locks.holder("kalshi:k-1")).toBe("x-1");
  });

  it("releases idempotently", () => {
    const locks = new MarketLocks();
    const release = locks.tryAcquire(["polymarket:pm-1"], "h-1");
    release?.();
    release?.();
    expect(locks.size()).toBe(0);
    expect(locks.tryAcquire(["polymarket:pm-1"], "h-2")).not.toBeNull();
  });

  it("collapses duplicate keys", () => {
    const locks = new MarketLocks();
    locks.tryAcquire(["polymarket:pm-1", "polymarket:pm-1"], "h-1");
    expect(locks.size()).toBe(1);
  });
});
