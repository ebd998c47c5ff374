/**
 * Bot Event Repository Interface
 *
 * - grid_setup / recenter / kill_switch / error events
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "../types";

export type EventSeverity = "INFO" | "WARNING" | "ERROR" | "CRITICAL";

export interface BotEventRecord {
  ts: Date;
  eventType: string;
  severity: EventSeverity;
  message: string;
  details: Record<string, unknown> | null;
}

export interface BotEventRepository {
  logEvent(event: BotEventRecord): ResultAsync<void, RepositoryError>;
}
