/**
 * Provider Registry
 *
 * Maps resource kinds to the client that manages them.
 */

import type { ProviderClient } from "./types.js";

export class ProviderRegistry {
  private readonly clients = new Map<string, ProviderClient>();

  constructor(entries?: Record<string, ProviderClient>) {
    for (const [kind, client] of Object.entries(entries ?? {})) {
      this.register(kind, client);
    }
  }

  /**
   * Register the client for a kind.
   */
  register(kind: string, client: ProviderClient): this {
    if (this.clients.has(kind)) {
      throw new Error(`Provider for kind "${kind}" is already registered`);
    }
    this.clients.set(kind, client);
    return this;
  }

  get(kind: string): ProviderClient | undefined {
    return this.clients.get(kind);
  }

  has(kind: string): boolean {
    return this.clients.has(kind);
  }

  /** Registered kinds, sorted. */
  kinds(): string[] {
    return [...this.clients.keys()].sort();
  }

  unregister(kind: string): boolean {
    return this.clients.delete(kind);
  }
}
