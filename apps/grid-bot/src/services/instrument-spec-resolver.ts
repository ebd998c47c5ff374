/**
 * Instrument Spec Resolver - Trading increments per symbol
 *
 * - Fetched once through the gateway, then served from cache
 * - refresh() drops the entry and fetches again
 */

import { okAsync, type ResultAsync } from "neverthrow";
import type { ExchangeGateway, GatewayError } from "@grid-bot/adapters";
import type { InstrumentSpec } from "@grid-bot/core";
import { logger } from "@grid-bot/utils";

/**
 * Used when the venue publishes no minimum notional for the symbol
 */
export const DEFAULT_MIN_NOTIONAL = 5;

export class InstrumentSpecResolver {
  private readonly cache = new Map<string, InstrumentSpec>();

  constructor(private readonly gateway: Pick<ExchangeGateway, "getInstrumentInfo">) {}

  resolve(symbol: string): ResultAsync<InstrumentSpec, GatewayError> {
    const cached = this.cache.get(symbol);
    if (cached) return okAsync(cached);

    return this.gateway.getInstrumentInfo(symbol).map(info => {
      const spec: InstrumentSpec = {
        symbol,
        minOrderQty: info.minOrderQty,
        qtyStep: info.qtyStep,
        tickSize: info.tickSize,
        minNotional: info.minNotional ?? DEFAULT_MIN_NOTIONAL,
      };
      this.cache.set(symbol, spec);
      logger.info("Instrument spec loaded", { ...spec });
      return spec;
    });
  }

  refresh(symbol: string): ResultAsync<InstrumentSpec, GatewayError> {
    this.cache.delete(symbol);
    return this.resolve(symbol);
  }
}
