import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import type { ConfigType } from '@nestjs/config';
import quotesConfig from '../config/quotes.config';
import type { CurrencyCode } from '../currencies/currency.registry';
import { RateReconciler } from './rate.reconciler';
import { CachedRate } from './types';

/**
 * One entry per (base, target) pair, written for every target of a base in one
 * refresh. Entries carry their own expiry, checked on read, and are also handed
 * to the store with the same TTL so it can evict them.
 */
@Injectable()
export class RateCache {
  private readonly logger = new Logger(RateCache.name);
  private readonly inflight = new Map<CurrencyCode, Promise<void>>();

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    private readonly reconciler: RateReconciler,
    @Inject(quotesConfig.KEY) private readonly config: ConfigType<typeof quotesConfig>,
  ) {}

  key(base: CurrencyCode, target: CurrencyCode) {
    return `${base}:${target}`;
  }

  async get(base: CurrencyCode, target: CurrencyCode): Promise<number | undefined> {
    const hit = await this.cache.get<CachedRate>(this.key(base, target));
    if (!hit) return undefined;
    if (hit.expiresAt <= Date.now()) {
      this.logger.debug(`${this.key(base, target)} expired`);
      return undefined;
    }
    return hit.rate;
  }

  // Concurrent refreshes of one base share a single upstream round-trip.
  refresh(base: CurrencyCode): Promise<void> {
    const running = this.inflight.get(base);
    if (running) return running;

    const job = this.store(base).finally(() => this.inflight.delete(base));
    this.inflight.set(base, job);
    return job;
  }

  async getOrRefresh(base: CurrencyCode, target: CurrencyCode): Promise<number | undefined> {
    const hit = await this.get(base, target);
    if (hit !== undefined) return hit;

    this.logger.debug(`miss ${this.key(base, target)}, refreshing ${base}`);
    await this.refresh(base);
    return this.get(base, target);
  }

  private async store(base: CurrencyCode): Promise<void> {
    const rates = await this.reconciler.getMaxRates(base);
    const ttl = this.config.cache.ttlMs;
    const now = Date.now();

    const entries: CachedRate[] = [];
    for (const [quote, rate] of Object.entries(rates)) {
      if (rate === undefined) continue;
      entries.push({ base, quote, rate, asOf: new Date(now).toISOString(), expiresAt: now + ttl });
    }

    await Promise.all(entries.map(e => this.cache.set(this.key(e.base, e.quote), e, ttl)));
    this.logger.log(`stored ${entries.length} rate(s) for ${base}`);
  }
}
