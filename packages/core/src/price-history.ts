/**
 * Bounded price history (oldest first)
 */

import type { Ms, PricePoint } from "./types";

export class PriceHistory {
  private points: PricePoint[] = [];

  constructor(private readonly capacity: number) {}

  push(price: number, tsMs: Ms): void {
    this.points.push({ price, tsMs });
    if (this.points.length > this.capacity) {
      this.points.splice(0, this.points.length - this.capacity);
    }
  }

  toArray(): readonly PricePoint[] {
    return this.points;
  }

  get length(): number {
    return this.points.length;
  }

  latest(): PricePoint | undefined {
    return this.points[this.points.length - 1];
  }
}
