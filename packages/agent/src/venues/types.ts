import type { Market, OrderAction, PriceQuote, Side } from "../types.js";

export interface PlaceOrderParams {
  marketId: string;
  side: Side;
  action: OrderAction;
  price: bigint; // limit price, 1e18
  size: number;
}

export interface OrderResult {
  success: boolean;
  orderId?: string;
  error?: string;
}

export type OrderStatus =
  | "OPEN"
  | "PARTIALLY_FILLED"
  | "FILLED"
  | "CANCELLED"
  | "REJECTED"
  | "EXPIRED";

export interface OrderStatusResult {
  orderId: string;
  status: OrderStatus;
  filledSize: number;
  remainingSize: number;
  avgFillPrice: bigint;
}

export type QuoteHandler = (quote: PriceQuote) => void;

/**
 * Contract every venue connector implements. Transport, authentication and
 * signing live behind it. Transient failures are thrown as
 * TransientVenueError, unrecoverable ones as FatalVenueError.
 */
export interface VenueAdapter {
  readonly name: string;
  /** Whether two orders may be in flight on this venue at once */
  readonly concurrentOrders: boolean;

  listMarkets(): Promise<Market[]>;
  getQuote(marketId: string, side: Side): Promise<PriceQuote>;
  /** Push equivalent of getQuote; returns an unsubscribe function */
  subscribeQuotes?(handler: QuoteHandler): () => void;
  submitOrder(params: PlaceOrderParams): Promise<OrderResult>;
  getOrderStatus(orderId: string): Promise<OrderStatusResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  getBalance(): Promise<bigint>;
  /** null while the market is unresolved or its outcome is ambiguous */
  getResolution(marketId: string): Promise<Side | null>;
}
