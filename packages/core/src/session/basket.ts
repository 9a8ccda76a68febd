/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview The purchase basket of one session.
 *
 * A multiset of ingredients with the price seen when each was added. Checkout
 * re-reads the current shop prices; the prices here only drive the running
 * total shown to the user and the model.
 */

/** Largest quantity a single add accepts */
export const MAX_UNITS_PER_ADD = 99;

export interface BasketItem {
  ingredientId: number;
  name: string;
  price: number;
}

export interface BasketLine extends BasketItem {
  quantity: number;
}

export class Basket {
  private readonly lineMap = new Map<number, BasketLine>();

  /**
   * Adds `quantity` units. Quantities below 1 count as 1.
   *
   * @throws RangeError when `quantity` is above {@link MAX_UNITS_PER_ADD} or not
   *   a number; the basket is left unchanged
   */
  add(item: BasketItem, quantity = 1): void {
    if (Number.isNaN(quantity) || quantity > MAX_UNITS_PER_ADD) {
      throw new RangeError(
        `Quantity must be at most ${MAX_UNITS_PER_ADD}, got ${quantity}`,
      );
    }
    const count = Math.max(1, Math.floor(quantity));
    const existing = this.lineMap.get(item.ingredientId);
    if (existing) {
      existing.quantity += count;
      existing.price = item.price;
      existing.name = item.name;
      return;
    }
    this.lineMap.set(item.ingredientId, { ...item, quantity: count });
  }

  /** Lines in the order their ingredient was first added */
  get lines(): BasketLine[] {
    return [...this.lineMap.values()].map((line) => ({ ...line }));
  }

  get isEmpty(): boolean {
    return this.lineMap.size === 0;
  }

  /** Total number of units */
  get count(): number {
    let count = 0;
    for (const line of this.lineMap.values()) {
      count += line.quantity;
    }
    return count;
  }

  get total(): number {
    let total = 0;
    for (const line of this.lineMap.values()) {
      total += line.price * line.quantity;
    }
    return roundCents(total);
  }

  /**
   * One name per unit, e.g. `['Tomato', 'Tomato', 'Onion']`.
   */
  itemNames(): string[] {
    return this.lines.flatMap((line) =>
      new Array<string>(line.quantity).fill(line.name),
    );
  }

  clear(): void {
    this.lineMap.clear();
  }

  /**
   * One line for the system prompt: `Basket: 2× Tomato, 1× Onion (total €5.00)`.
   */
  synopsis(): string {
    if (this.isEmpty) {
      return 'Basket: (empty)';
    }
    const items = this.lines
      .map((line) => `${line.quantity}× ${line.name}`)
      .join(', ');
    return `Basket: ${items} (total €${this.total.toFixed(2)})`;
  }
}

export function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}
