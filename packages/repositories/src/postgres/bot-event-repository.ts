/**
 * Postgres Bot Event Repository
 */

import { ResultAsync } from "neverthrow";
import { botEvent, type Db } from "@grid-bot/db";

import type { BotEventRecord, BotEventRepository } from "../interfaces/bot-event-repository";
import { toDbError, type RepositoryError } from "../types";

/**
 * Create a Postgres bot event repository
 */
export function createPostgresBotEventRepository(db: Db): BotEventRepository {
  return {
    logEvent(event: BotEventRecord): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(botEvent).values({
          ts: event.ts,
          eventType: event.eventType,
          severity: event.severity,
          message: event.message,
          details: event.details,
        }),
        toDbError,
      ).map(() => undefined);
    },
  };
}
