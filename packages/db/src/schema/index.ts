/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all database schemas
 * - timestamptz (UTC) everywhere
 */

// Configuration
export * from "./bot-config";

// Grid state
export * from "./grid-history";
export * from "./grid-order";
export * from "./grid-trade";

// Reporting
export * from "./equity-snapshot";
export * from "./pnl-summary";
export * from "./bot-event";
