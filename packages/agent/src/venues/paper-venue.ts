import type { Market, PriceQuote, Side } from "../types.js";
import type {
  OrderResult,
  OrderStatusResult,
  PlaceOrderParams,
  QuoteHandler,
  VenueAdapter,
} from "./types.js";
import { costOf } from "../fixed-point.js";
import { log } from "../logger.js";

// Paper venue: in-process order books with immediate-or-rest matching.
// Used for dry runs and as the venue stand-in in tests.

export interface PaperBook {
  bestBid: bigint;
  bestAsk: bigint;
  bidSize: number;
  askSize: number;
}

interface PaperOrder {
  orderId: string;
  params: PlaceOrderParams;
  status: OrderStatusResult["status"];
  filledSize: number;
  avgFillPrice: bigint;
}

export interface PaperVenueOptions {
  name: string;
  balance: bigint;
  concurrentOrders?: boolean;
  now?: () => number;
}

function bookKey(marketId: string, side: Side): string {
  return `${marketId}:${side}`;
}

export class PaperVenue implements VenueAdapter {
  readonly name: string;
  readonly concurrentOrders: boolean;

  private markets = new Map<string, Market>();
  private books = new Map<string, PaperBook>();
  private orders = new Map<string, PaperOrder>();
  private resolutions = new Map<string, Side>();
  private handlers = new Set<QuoteHandler>();
  private balance: bigint;
  private seq = 0;
  private now: () => number;

  constructor(opts: PaperVenueOptions) {
    this.name = opts.name;
    this.concurrentOrders = opts.concurrentOrders ?? true;
    this.balance = opts.balance;
    this.now = opts.now ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Simulation controls
  // ---------------------------------------------------------------------------

  setMarkets(markets: Market[]): void {
    this.markets = new Map(markets.map((m) => [m.marketId, m]));
  }

  setBook(marketId: string, side: Side, book: PaperBook): void {
    this.books.set(bookKey(marketId, side), { ...book });
    const quote = this.toQuote(marketId, side, book);
    for (const handler of this.handlers) handler(quote);
  }

  resolve(marketId: string, outcome: Side): void {
    this.resolutions.set(marketId, outcome);
    const market = this.markets.get(marketId);
    if (market) {
      this.markets.set(marketId, { ...market, status: { kind: "Resolved", outcome } });
    }
  }

  // ---------------------------------------------------------------------------
  // VenueAdapter
  // ---------------------------------------------------------------------------

  async listMarkets(): Promise<Market[]> {
    return [...this.markets.values()];
  }

  async getQuote(marketId: string, side: Side): Promise<PriceQuote> {
    const book = this.books.get(bookKey(marketId, side));
    if (!book) {
      throw new Error(`No book for ${this.name}:${marketId}:${side}`);
    }
    return this.toQuote(marketId, side, book);
  }

  subscribeQuotes(handler: QuoteHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async submitOrder(params: PlaceOrderParams): Promise<OrderResult> {
    const market = this.markets.get(params.marketId);
    if (!market || market.status.kind !== "Open") {
      return { success: false, error: "market not open" };
    }
    if (params.size <= 0) {
      return { success: false, error: "invalid size" };
    }
    const notional = costOf(params.price, params.size);
    if (params.action === "BUY" && notional > this.balance) {
      return { success: false, error: "insufficient balance" };
    }

    const orderId = `${this.name}-${++this.seq}`;
    const order: PaperOrder = { orderId, params, status: "OPEN", filledSize: 0, avgFillPrice: 0n };
    this.orders.set(orderId, order);
    this.match(order);
    return { success: true, orderId };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusResult> {
    const order = this.orders.get(orderId);
    if (!order) {
      return { orderId, status: "REJECTED", filledSize: 0, remainingSize: 0, avgFillPrice: 0n };
    }
    return {
      orderId,
      status: order.status,
      filledSize: order.filledSize,
      remainingSize: order.params.size - order.filledSize,
      avgFillPrice: order.avgFillPrice,
    };
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    const order = this.orders.get(orderId);
    if (!order || (order.status !== "OPEN" && order.status !== "PARTIALLY_FILLED")) return false;
    order.status = "CANCELLED";
    return true;
  }

  async getBalance(): Promise<bigint> {
    return this.balance;
  }

  async getResolution(marketId: string): Promise<Side | null> {
    return this.resolutions.get(marketId) ?? null;
  }

  // ---------------------------------------------------------------------------
  // Matching
  // ---------------------------------------------------------------------------

  private match(order: PaperOrder): void {
    const { marketId, side, action, price, size } = order.params;
    const book = this.books.get(bookKey(marketId, side));
    if (!book) return;

    const crosses = action === "BUY" ? price >= book.bestAsk : price <= book.bestBid;
    const available = action === "BUY" ? book.askSize : book.bidSize;
    if (!crosses || available <= 0) return;

    const fillPrice = action === "BUY" ? book.bestAsk : book.bestBid;
    const filled = Math.min(size, available);
    order.filledSize = filled;
    order.avgFillPrice = fillPrice;
    order.status = filled === size ? "FILLED" : "PARTIALLY_FILLED";

    const notional = costOf(fillPrice, filled);
    if (action === "BUY") {
      this.balance -= notional;
      book.askSize -= filled;
    } else {
      this.balance += notional;
      book.bidSize -= filled;
    }

    log.debug("Paper fill", { venue: this.name, orderId: order.orderId, marketId, side, action, filled });
  }

  private toQuote(marketId: string, side: Side, book: PaperBook): PriceQuote {
    return Object.freeze({
      venue: this.name,
      marketId,
      side,
      bestBid: book.bestBid,
      bestAsk: book.bestAsk,
      bidSize: book.bidSize,
      askSize: book.askSize,
      timestamp: this.now(),
    });
  }
}
