/**
 * Exchange Gateway Port - Interface to a perpetual-futures venue
 *
 * - Adapters implement this port for venue-specific REST calls
 * - Values are parsed into numbers except order price/qty, which are sent
 *   as pre-formatted strings
 */

import type { ResultAsync } from "neverthrow";

export type OrderSide = "buy" | "sell";

export interface Ticker {
  symbol: string;
  lastPrice: number;
  bestBid: number;
  bestAsk: number;
  markPrice: number;
}

export interface InstrumentInfo {
  symbol: string;
  tickSize: string;
  qtyStep: string;
  minOrderQty: number;
  /** null when the venue does not publish one */
  minNotional: number | null;
}

export interface OpenOrder {
  orderId: string;
  orderLinkId: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
  status: string;
  createdAt: Date;
}

/**
 * Post-only limit order
 */
export interface PlaceOrderRequest {
  symbol: string;
  side: OrderSide;
  price: string;
  qty: string;
  /** Client-chosen id, unique per order */
  orderLinkId: string;
}

export interface PlaceOrderResponse {
  orderId: string;
  orderLinkId: string;
}

export interface PositionInfo {
  symbol: string;
  side: OrderSide | "none";
  size: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  positionValue: number;
}

export interface WalletBalance {
  coin: string;
  totalEquity: number;
  availableBalance: number;
}

export interface Execution {
  execId: string;
  orderId: string;
  orderLinkId: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
  fee: number;
  isMaker: boolean;
  execTime: Date;
}

/**
 * Gateway errors
 */
export type GatewayError =
  | { type: "network"; message: string }
  | { type: "rate_limit"; message: string; code?: number }
  | { type: "auth"; message: string; code?: number }
  | { type: "invalid_request"; message: string; code?: number }
  | { type: "exchange_error"; message: string; code?: number }
  | { type: "invalid_response"; message: string };

export function isRetryableGatewayError(error: GatewayError): boolean {
  return error.type === "network" || error.type === "rate_limit";
}

/**
 * Exchange Gateway interface
 */
export interface ExchangeGateway {
  getTicker(symbol: string): ResultAsync<Ticker, GatewayError>;

  getInstrumentInfo(symbol: string): ResultAsync<InstrumentInfo, GatewayError>;

  getOpenOrders(symbol: string): ResultAsync<OpenOrder[], GatewayError>;

  placePostOnlyOrder(request: PlaceOrderRequest): ResultAsync<PlaceOrderResponse, GatewayError>;

  /**
   * Cancel every open order on the symbol. Resolves to the number cancelled.
   */
  cancelAllOrders(symbol: string): ResultAsync<number, GatewayError>;

  getPositions(symbol: string): ResultAsync<PositionInfo[], GatewayError>;

  getWalletBalance(coin: string): ResultAsync<WalletBalance, GatewayError>;

  /**
   * Most recent executions, newest first
   */
  getRecentExecutions(symbol: string, limit: number): ResultAsync<Execution[], GatewayError>;

  setLeverage(symbol: string, leverage: number): ResultAsync<void, GatewayError>;
}
