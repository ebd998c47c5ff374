/**
 * Order Repository Interface
 *
 * - Every order the bot places, and its lifecycle status
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError, TradeSide } from "../types";

export type OrderKind = "grid" | "take_profit";

export interface OrderRecord {
  orderId: string;
  orderLinkId: string;
  symbol: string;
  side: TradeSide;
  price: number;
  qty: number;
  orderType: OrderKind;
  /** Exchange status wording: New / Filled / Cancelled */
  status: string;
  gridLevel: number | null;
  createdAt: Date;
}

export interface OrderRepository {
  saveOrder(order: OrderRecord): ResultAsync<void, RepositoryError>;

  /**
   * Set the status; `at` fills filled_at for Filled and canceled_at for Cancelled.
   */
  updateOrderStatus(orderId: string, status: string, at?: Date): ResultAsync<void, RepositoryError>;
}
