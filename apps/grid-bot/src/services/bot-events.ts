/**
 * Bot event recording
 *
 * Events are a durable audit trail next to the log. A failed write is logged
 * and never interrupts the caller.
 */

import type { BotEventRepository, EventSeverity } from "@grid-bot/repositories";
import { logger } from "@grid-bot/utils";

import type { Clock } from "./clock";

export interface BotEventInput {
  eventType: string;
  severity: EventSeverity;
  message: string;
  details?: Record<string, unknown>;
}

export async function recordEvent(
  store: Pick<BotEventRepository, "logEvent">,
  now: Clock,
  event: BotEventInput,
): Promise<void> {
  const result = await store.logEvent({
    ts: new Date(now()),
    eventType: event.eventType,
    severity: event.severity,
    message: event.message,
    details: event.details ?? null,
  });
  if (result.isErr()) {
    logger.warn("Failed to record bot event", { eventType: event.eventType, error: result.error.message });
  }
}
