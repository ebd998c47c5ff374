/**
 * Bybit V5 Types
 *
 * Documentation: https://bybit-exchange.github.io/docs/v5/intro
 *
 * Bybit returns every number as a string, and "" for absent values.
 */

import { z } from "zod";

/**
 * Bybit configuration schema
 */
export const BybitConfigSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
  testnet: z.boolean().default(true),
  category: z.enum(["linear", "inverse"]).default("linear"),
  /**
   * Attempts per call (including the first)
   */
  maxAttempts: z.number().int().min(1).default(3),
  /**
   * Backoff base: waits base × 2^attempt between attempts
   */
  retryBaseDelayMs: z.number().int().min(0).default(1000),
});

export type BybitConfig = z.infer<typeof BybitConfigSchema>;

const num = z.string().transform(v => (v === "" ? 0 : Number(v)));
const side = z.enum(["Buy", "Sell"]).transform(v => (v === "Buy" ? ("buy" as const) : ("sell" as const)));
const msTimestamp = z.string().transform(v => new Date(Number(v)));

/**
 * Common envelope. `result` is parsed per endpoint.
 */
export const BybitEnvelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z.unknown(),
});

/**
 * Shape of the error bybit-api throws on HTTP failures
 */
export const BybitHttpErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
});

export const TickersResultSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      lastPrice: num,
      bid1Price: num,
      ask1Price: num,
      markPrice: num,
    }),
  ),
});

export const InstrumentsResultSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      priceFilter: z.object({ tickSize: z.string() }),
      lotSizeFilter: z.object({
        qtyStep: z.string(),
        minOrderQty: num,
        minNotionalValue: num.optional(),
      }),
    }),
  ),
});

export const ActiveOrdersResultSchema = z.object({
  list: z.array(
    z.object({
      orderId: z.string(),
      orderLinkId: z.string(),
      symbol: z.string(),
      side,
      price: num,
      qty: num,
      orderStatus: z.string(),
      createdTime: msTimestamp,
    }),
  ),
  /** Empty or absent on the last page */
  nextPageCursor: z.string().optional(),
});

export type BybitActiveOrder = z.infer<typeof ActiveOrdersResultSchema>["list"][number];

export const SubmitOrderResultSchema = z.object({
  orderId: z.string(),
  orderLinkId: z.string(),
});

export const CancelAllResultSchema = z.object({
  list: z.array(z.object({ orderId: z.string() })),
});

export const PositionsResultSchema = z.object({
  list: z.array(
    z.object({
      symbol: z.string(),
      side: z.string().transform(v => (v === "Buy" ? ("buy" as const) : v === "Sell" ? ("sell" as const) : ("none" as const))),
      size: num,
      avgPrice: num,
      markPrice: num,
      unrealisedPnl: num,
      positionValue: num,
    }),
  ),
});

export const WalletBalanceResultSchema = z.object({
  list: z.array(
    z.object({
      totalEquity: num,
      totalAvailableBalance: num,
      coin: z.array(
        z.object({
          coin: z.string(),
          equity: num,
          availableToWithdraw: num.optional(),
        }),
      ),
    }),
  ),
});

export const ExecutionListResultSchema = z.object({
  list: z.array(
    z.object({
      execId: z.string(),
      orderId: z.string(),
      orderLinkId: z.string(),
      symbol: z.string(),
      side,
      execPrice: num,
      execQty: num,
      execFee: num,
      isMaker: z.boolean(),
      execTime: msTimestamp,
    }),
  ),
});

/**
 * Bybit retCodes with a specific meaning to the bot
 */
export const RET_CODE = {
  OK: 0,
  LEVERAGE_NOT_MODIFIED: 110043,
} as const;

const RATE_LIMIT_CODES = new Set([10006, 10018]);
const AUTH_CODES = new Set([10003, 10004, 10005, 33004]);

export type RetCodeCategory = "rate_limit" | "auth" | "invalid_request" | "exchange_error";

export function classifyRetCode(code: number): RetCodeCategory {
  if (RATE_LIMIT_CODES.has(code)) return "rate_limit";
  if (AUTH_CODES.has(code)) return "auth";
  if (code === 10001 || (code >= 110000 && code < 120000)) return "invalid_request";
  return "exchange_error";
}
