/**
 * Cancel All Orders Script
 *
 * Cancels every open order for a symbol on Bybit, then verifies none remain.
 *
 * Usage:
 *   npm run cancel-all-orders -- --symbol XRPUSDT
 *
 * Environment variables (same as the bot):
 *   BYBIT_API_KEY=<your api key>
 *   BYBIT_API_SECRET=<your api secret>
 *   BYBIT_TESTNET=true|false (default: true)
 *   SYMBOL=<symbol> (fallback if --symbol not provided)
 */

import "dotenv/config";

import { BybitConfigSchema, BybitGateway } from "@grid-bot/adapters";
import { logger, sleep } from "@grid-bot/utils";

// ============================================================================
// CLI Parsing
// ============================================================================

interface Opts {
  symbol: string | null;
  category: "linear" | "inverse";
  help: boolean;
}

function usage(): string {
  return `
Cancel All Orders - Bybit

Usage:
  npm run cancel-all-orders -- --symbol <SYMBOL> [--inverse]

Options:
  --symbol <SYMBOL>   Contract symbol (e.g. XRPUSDT). Required (or set SYMBOL env).
  --inverse           Use the inverse category instead of linear.
  --help, -h          Show this help message.

Environment variables:
  BYBIT_API_KEY       API key
  BYBIT_API_SECRET    API secret
  BYBIT_TESTNET       true|false (default: true)
  SYMBOL              Fallback symbol if --symbol not provided
`.trim();
}

function parseArgs(argv: string[]): Opts {
  const opts: Opts = {
    symbol: null,
    category: "linear",
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      opts.help = true;
    } else if (arg === "--symbol") {
      opts.symbol = argv[++i] ?? null;
    } else if (arg === "--inverse") {
      opts.category = "inverse";
    }
  }

  return opts;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(usage());
    return;
  }

  const symbol = args.symbol ?? process.env.SYMBOL;
  if (!symbol) {
    console.error("ERROR: --symbol is required (or set SYMBOL env).\n");
    console.log(usage());
    process.exitCode = 1;
    return;
  }

  const configResult = BybitConfigSchema.safeParse({
    apiKey: process.env.BYBIT_API_KEY,
    apiSecret: process.env.BYBIT_API_SECRET,
    testnet: (process.env.BYBIT_TESTNET ?? "true") === "true",
    category: args.category,
  });
  if (!configResult.success) {
    logger.error("Invalid Bybit config from environment", {
      issues: configResult.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
    });
    process.exitCode = 1;
    return;
  }

  const gateway = new BybitGateway(configResult.data);
  logger.info("Starting cancel-all-orders", { symbol, testnet: configResult.data.testnet });

  // Step 1: Get current open orders
  const openOrdersResult = await gateway.getOpenOrders(symbol);
  if (openOrdersResult.isErr()) {
    logger.error("Failed to fetch open orders", { error: openOrdersResult.error.message });
    process.exitCode = 1;
    return;
  }

  const openOrders = openOrdersResult.value;
  logger.info(`Found ${openOrders.length} open order(s)`, {
    buys: openOrders.filter(o => o.side === "buy").length,
    sells: openOrders.filter(o => o.side === "sell").length,
  });
  if (openOrders.length === 0) {
    logger.info("No open orders to cancel. Done.");
    return;
  }

  // Step 2: Cancel all orders
  const cancelResult = await gateway.cancelAllOrders(symbol);
  if (cancelResult.isErr()) {
    logger.error("Failed to cancel orders", { error: cancelResult.error.message });
    process.exitCode = 1;
    return;
  }
  logger.info("Cancel request accepted", { cancelled: cancelResult.value });

  // Step 3: Verify (give the venue a moment)
  await sleep(2_000);
  const verifyResult = await gateway.getOpenOrders(symbol);
  if (verifyResult.isErr()) {
    logger.error("Failed to verify cancellation", { error: verifyResult.error.message });
    process.exitCode = 1;
    return;
  }

  const remaining = verifyResult.value;
  if (remaining.length === 0) {
    logger.info("All orders cancelled. Remaining: 0");
    return;
  }

  logger.warn(`${remaining.length} order(s) still open after cancel`, {
    remaining: remaining.map(o => ({ id: o.orderId, side: o.side, price: o.price, qty: o.qty })),
  });
  process.exitCode = 1;
}

// Run
main().catch((error: unknown) => {
  logger.error("Unexpected error", error);
  process.exitCode = 1;
});
