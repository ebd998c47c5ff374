/**
 * Postgres Order Repository
 */

import { eq } from "drizzle-orm";
import { ResultAsync } from "neverthrow";
import { gridOrder, type Db, type NewGridOrder } from "@grid-bot/db";

import type { OrderRecord, OrderRepository } from "../interfaces/order-repository";
import { toDbError, type RepositoryError } from "../types";

/**
 * Create a Postgres order repository
 */
export function createPostgresOrderRepository(db: Db): OrderRepository {
  return {
    saveOrder(order: OrderRecord): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(gridOrder)
          .values({
            orderId: order.orderId,
            orderLinkId: order.orderLinkId,
            symbol: order.symbol,
            side: order.side,
            price: String(order.price),
            qty: String(order.qty),
            orderType: order.orderType,
            status: order.status,
            gridLevel: order.gridLevel,
            createdAt: order.createdAt,
          })
          .onConflictDoNothing({ target: gridOrder.orderId }),
        toDbError,
      ).map(() => undefined);
    },

    updateOrderStatus(orderId: string, status: string, at?: Date): ResultAsync<void, RepositoryError> {
      const changes: Partial<NewGridOrder> = { status };
      if (status === "Filled") changes.filledAt = at ?? new Date();
      if (status === "Cancelled") changes.canceledAt = at ?? new Date();

      return ResultAsync.fromPromise(
        db.update(gridOrder).set(changes).where(eq(gridOrder.orderId, orderId)),
        toDbError,
      ).map(() => undefined);
    },
  };
}
