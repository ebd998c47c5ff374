/**
 * packages/repositories - State Store
 *
 * - Interface-based repository pattern
 * - Postgres implementations on drizzle
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./types";
