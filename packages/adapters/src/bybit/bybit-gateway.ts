/**
 * Bybit Exchange Gateway
 *
 * - Post-only limit orders via the V5 REST API
 * - Non-zero retCodes mapped to GatewayError
 * - Exponential backoff on rate limits and network failures
 *
 * SDK: https://github.com/tiagosiebler/bybit-api
 */

import { err, ok, okAsync, ResultAsync, type Result } from "neverthrow";
import { RestClientV5 } from "bybit-api";
import type { z } from "zod";
import { logger, type Sleep } from "@grid-bot/utils";

import {
  isRetryableGatewayError,
  type ExchangeGateway,
  type Execution,
  type GatewayError,
  type InstrumentInfo,
  type OpenOrder,
  type PlaceOrderRequest,
  type PlaceOrderResponse,
  type PositionInfo,
  type Ticker,
  type WalletBalance,
} from "../ports";
import { withRetry } from "./retry";
import {
  ActiveOrdersResultSchema,
  BybitEnvelopeSchema,
  BybitHttpErrorSchema,
  CancelAllResultSchema,
  classifyRetCode,
  ExecutionListResultSchema,
  InstrumentsResultSchema,
  PositionsResultSchema,
  RET_CODE,
  SubmitOrderResultSchema,
  TickersResultSchema,
  WalletBalanceResultSchema,
  type BybitActiveOrder,
  type BybitConfig,
} from "./types";

const OPEN_ORDERS_PAGE_SIZE = 50;
/** Upper bound on cursor pages per open-orders read */
const OPEN_ORDERS_MAX_PAGES = 10;

/**
 * Subset of the SDK client the gateway calls
 */
export type BybitRestClient = Pick<
  RestClientV5,
  | "getTickers"
  | "getInstrumentsInfo"
  | "getActiveOrders"
  | "submitOrder"
  | "cancelAllOrders"
  | "getPositionInfo"
  | "getWalletBalance"
  | "getExecutionList"
  | "setLeverage"
>;

const isPlaceRetryable = (error: GatewayError): boolean => error.type === "rate_limit";

/**
 * Map an exception thrown by the SDK (HTTP failure, timeout, DNS ...)
 */
export function mapThrownError(error: unknown): GatewayError {
  if (error instanceof Error) {
    return { type: "network", message: error.message };
  }

  const parsed = BybitHttpErrorSchema.safeParse(error);
  if (parsed.success) {
    const { code, message } = parsed.data;
    const text = message ?? `HTTP ${code ?? "error"}`;
    if (code === 429 || code === 403) return { type: "rate_limit", message: text, code };
    if (code === 401) return { type: "auth", message: text, code };
    return { type: "network", message: text };
  }

  return { type: "network", message: String(error) };
}

export function mapRetCode(code: number, message: string): GatewayError {
  return { type: classifyRetCode(code), message: `${message} (retCode ${code})`, code };
}

/**
 * Bybit gateway
 *
 * Implements ExchangeGateway for Bybit V5 using bybit-api
 */
export class BybitGateway implements ExchangeGateway {
  private readonly client: BybitRestClient;
  private readonly sleep: Sleep | undefined;

  constructor(
    private readonly config: BybitConfig,
    options: { client?: BybitRestClient; sleep?: Sleep } = {},
  ) {
    this.client =
      options.client ?? new RestClientV5({ key: config.apiKey, secret: config.apiSecret, testnet: config.testnet });
    this.sleep = options.sleep;

    // NOTE: Do not log secrets.
    logger.info("Bybit gateway constructed", {
      testnet: config.testnet,
      category: config.category,
      apiKeyPresent: Boolean(config.apiKey),
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Plumbing
  // ─────────────────────────────────────────────────────────────────────────

  private unwrap<S extends z.ZodType>(
    operation: string,
    schema: S,
    raw: unknown,
    acceptedCodes: readonly number[],
  ): Result<z.output<S>, GatewayError> {
    const envelope = BybitEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return err({ type: "invalid_response", message: `${operation}: malformed response envelope` });
    }

    const { retCode, retMsg, result } = envelope.data;
    if (!acceptedCodes.includes(retCode)) {
      return err(mapRetCode(retCode, retMsg));
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      return err({ type: "invalid_response", message: `${operation}: ${parsed.error.message}` });
    }
    return ok(parsed.data);
  }

  private call<S extends z.ZodType>(
    operation: string,
    schema: S,
    send: () => Promise<unknown>,
    options: { shouldRetry?: (error: GatewayError) => boolean; acceptedCodes?: readonly number[] } = {},
  ): ResultAsync<z.output<S>, GatewayError> {
    const acceptedCodes: readonly number[] = options.acceptedCodes ?? [RET_CODE.OK];
    return withRetry(
      () =>
        ResultAsync.fromPromise(send(), mapThrownError).andThen(raw =>
          this.unwrap(operation, schema, raw, acceptedCodes),
        ),
      {
        operation,
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        shouldRetry: options.shouldRetry ?? isRetryableGatewayError,
        sleep: this.sleep,
      },
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Market data
  // ─────────────────────────────────────────────────────────────────────────

  getTicker(symbol: string): ResultAsync<Ticker, GatewayError> {
    return this.call("getTicker", TickersResultSchema, () =>
      this.client.getTickers({ category: this.config.category, symbol }),
    ).andThen(({ list }): Result<Ticker, GatewayError> => {
      const ticker = list.find(t => t.symbol === symbol);
      if (!ticker) return err({ type: "invalid_response", message: `No ticker for ${symbol}` });
      return ok({
        symbol,
        lastPrice: ticker.lastPrice,
        bestBid: ticker.bid1Price,
        bestAsk: ticker.ask1Price,
        markPrice: ticker.markPrice,
      });
    });
  }

  getInstrumentInfo(symbol: string): ResultAsync<InstrumentInfo, GatewayError> {
    return this.call("getInstrumentInfo", InstrumentsResultSchema, () =>
      this.client.getInstrumentsInfo({ category: this.config.category, symbol }),
    ).andThen(({ list }): Result<InstrumentInfo, GatewayError> => {
      const info = list.find(i => i.symbol === symbol);
      if (!info) return err({ type: "invalid_response", message: `No instrument info for ${symbol}` });
      const minNotional = info.lotSizeFilter.minNotionalValue;
      return ok({
        symbol,
        tickSize: info.priceFilter.tickSize,
        qtyStep: info.lotSizeFilter.qtyStep,
        minOrderQty: info.lotSizeFilter.minOrderQty,
        minNotional: minNotional !== undefined && minNotional > 0 ? minNotional : null,
      });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Orders
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Follows `nextPageCursor` so a ladder larger than one page is read whole.
   */
  getOpenOrders(symbol: string): ResultAsync<OpenOrder[], GatewayError> {
    return this.fetchOrderPages(symbol, undefined, [], 1).map(list =>
      list.map(o => ({
        orderId: o.orderId,
        orderLinkId: o.orderLinkId,
        symbol: o.symbol,
        side: o.side,
        price: o.price,
        qty: o.qty,
        status: o.orderStatus,
        createdAt: o.createdTime,
      })),
    );
  }

  private fetchOrderPages(
    symbol: string,
    cursor: string | undefined,
    collected: BybitActiveOrder[],
    page: number,
  ): ResultAsync<BybitActiveOrder[], GatewayError> {
    return this.call("getOpenOrders", ActiveOrdersResultSchema, () =>
      this.client.getActiveOrders({ category: this.config.category, symbol, limit: OPEN_ORDERS_PAGE_SIZE, cursor }),
    ).andThen(({ list, nextPageCursor }): ResultAsync<BybitActiveOrder[], GatewayError> => {
      const orders = [...collected, ...list];
      if (!nextPageCursor) return okAsync(orders);
      if (page >= OPEN_ORDERS_MAX_PAGES) {
        logger.warn("Open orders truncated", { symbol, pages: page, orders: orders.length });
        return okAsync(orders);
      }
      return this.fetchOrderPages(symbol, nextPageCursor, orders, page + 1);
    });
  }

  /**
   * Only rate limits are retried: a network failure may hide an accepted order.
   */
  placePostOnlyOrder(request: PlaceOrderRequest): ResultAsync<PlaceOrderResponse, GatewayError> {
    return this.call(
      "placePostOnlyOrder",
      SubmitOrderResultSchema,
      () =>
        this.client.submitOrder({
          category: this.config.category,
          symbol: request.symbol,
          side: request.side === "buy" ? "Buy" : "Sell",
          orderType: "Limit",
          qty: request.qty,
          price: request.price,
          timeInForce: "PostOnly",
          orderLinkId: request.orderLinkId,
        }),
      { shouldRetry: isPlaceRetryable },
    );
  }

  cancelAllOrders(symbol: string): ResultAsync<number, GatewayError> {
    return this.call("cancelAllOrders", CancelAllResultSchema, () =>
      this.client.cancelAllOrders({ category: this.config.category, symbol }),
    ).map(({ list }) => list.length);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Account
  // ─────────────────────────────────────────────────────────────────────────

  getPositions(symbol: string): ResultAsync<PositionInfo[], GatewayError> {
    return this.call("getPositions", PositionsResultSchema, () =>
      this.client.getPositionInfo({ category: this.config.category, symbol }),
    ).map(({ list }) =>
      list.map(p => ({
        symbol: p.symbol,
        side: p.side,
        size: p.size,
        entryPrice: p.avgPrice,
        markPrice: p.markPrice,
        unrealizedPnl: p.unrealisedPnl,
        positionValue: p.positionValue,
      })),
    );
  }

  getWalletBalance(coin: string): ResultAsync<WalletBalance, GatewayError> {
    return this.call("getWalletBalance", WalletBalanceResultSchema, () =>
      this.client.getWalletBalance({ accountType: "UNIFIED", coin }),
    ).andThen(({ list }): Result<WalletBalance, GatewayError> => {
      const account = list[0];
      if (!account) return err({ type: "invalid_response", message: "Empty wallet balance" });
      const coinBalance = account.coin.find(c => c.coin === coin);
      return ok({
        coin,
        totalEquity: account.totalEquity,
        availableBalance: coinBalance?.availableToWithdraw ?? account.totalAvailableBalance,
      });
    });
  }

  getRecentExecutions(symbol: string, limit: number): ResultAsync<Execution[], GatewayError> {
    return this.call("getRecentExecutions", ExecutionListResultSchema, () =>
      this.client.getExecutionList({ category: this.config.category, symbol, limit }),
    ).map(({ list }) =>
      list.map(e => ({
        execId: e.execId,
        orderId: e.orderId,
        orderLinkId: e.orderLinkId,
        symbol: e.symbol,
        side: e.side,
        price: e.execPrice,
        qty: e.execQty,
        fee: e.execFee,
        isMaker: e.isMaker,
        execTime: e.execTime,
      })),
    );
  }

  /**
   * "Leverage not modified" counts as success.
   */
  setLeverage(symbol: string, leverage: number): ResultAsync<void, GatewayError> {
    const value = String(leverage);
    return this.call(
      "setLeverage",
      BybitEnvelopeSchema.shape.result,
      () =>
        this.client.setLeverage({
          category: this.config.category,
          symbol,
          buyLeverage: value,
          sellLeverage: value,
        }),
      { acceptedCodes: [RET_CODE.OK, RET_CODE.LEVERAGE_NOT_MODIFIED] },
    ).map(() => undefined);
  }
}
