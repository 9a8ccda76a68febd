/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  SessionController,
  debugLogger,
  type SessionDependencies,
} from '@mealcart/core';

/**
 * One {@link SessionController} per customer name, opened on first use.
 * Sessions of different customers are independent.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Promise<SessionController>>();

  constructor(private readonly deps: SessionDependencies) {}

  /**
   * The session of `customer`, opening it (and creating the customer) on
   * first use. Concurrent first calls share one session.
   */
  get(customer: string): Promise<SessionController> {
    const key = normalizeName(customer);
    const existing = this.sessions.get(key);
    if (existing) {
      return existing;
    }

    const opening = this.open(key);
    this.sessions.set(key, opening);
    return opening;
  }

  private async open(key: string): Promise<SessionController> {
    try {
      const session = await SessionController.open(this.deps, key);
      debugLogger.log(
        `[SessionManager] Opened session for customer ${session.customer.id}`,
      );
      return session;
    } catch (error) {
      this.sessions.delete(key);
      throw error;
    }
  }

  has(customer: string): boolean {
    return this.sessions.has(normalizeName(customer));
  }

  /**
   * Drops the session; the next message starts a fresh conversation.
   */
  end(customer: string): boolean {
    return this.sessions.delete(normalizeName(customer));
  }

  list(): string[] {
    return [...this.sessions.keys()];
  }
}

function normalizeName(customer: string): string {
  return customer.trim().replace(/\s+/g, ' ');
}
