import { Inject, Injectable } from '@nestjs/common';
import type { Quote } from '../interfaces/collaborators.interface';
import type { ResolvedSessionOptions } from '../interfaces/session-module-options.interface';
import { SESSION_MODULE_OPTIONS } from '../session.constants';

export interface QuoteCacheEntry {
  quotes: Quote[];
  createdAt: number;
  expiresAt: number;
}

export interface QuoteCacheStats {
  hits: number;
  misses: number;
  /** Percentage of lookups served from the cache, one decimal. */
  hitRate: number;
  size: number;
}

/**
 * Fingerprint-keyed quote cache shared by all users. Entries expire
 * passively; `delete` forces the next lookup to miss.
 */
@Injectable()
export class QuoteCache {
  private readonly entries = new Map<string, QuoteCacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(
    @Inject(SESSION_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedSessionOptions, 'quoteTtlSeconds'>,
  ) {}

  get(fingerprint: string): Quote[] | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      this.misses++;
      return null;
    }

    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(fingerprint);
      this.misses++;
      return null;
    }

    this.hits++;
    return entry.quotes.map((quote) => ({ ...quote }));
  }

  set(
    fingerprint: string,
    quotes: Quote[],
    ttlSeconds: number = this.options.quoteTtlSeconds,
  ): void {
    const now = Date.now();
    this.entries.set(fingerprint, {
      quotes: quotes.map((quote) => ({ ...quote })),
      createdAt: now,
      expiresAt: now + ttlSeconds * 1000,
    });
  }

  delete(fingerprint: string): boolean {
    return this.entries.delete(fingerprint);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /** Drops expired entries and returns how many were removed. */
  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [fingerprint, entry] of this.entries.entries()) {
      if (entry.expiresAt <= now) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  getStats(): QuoteCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? Math.round((this.hits / total) * 1000) / 10 : 0,
      size: this.entries.size,
    };
  }
}
