import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CurrencyCode } from '../currencies/currency.registry';
import { RATE_SOURCES, RateMap, RateSource } from './types';

/** Per target currency, the highest rate any source reported. */
export function mergeMaxRates(maps: RateMap[]): RateMap {
  const merged: RateMap = {};
  for (const map of maps) {
    for (const [code, rate] of Object.entries(map)) {
      if (rate === undefined) continue;
      const current = merged[code];
      if (current === undefined || rate > current) merged[code] = rate;
    }
  }
  return merged;
}

@Injectable()
export class RateReconciler {
  private readonly logger = new Logger(RateReconciler.name);

  constructor(@Inject(RATE_SOURCES) private readonly sources: RateSource[]) {}

  // Sources run concurrently; a failed source contributes nothing.
  async getMaxRates(base: CurrencyCode): Promise<RateMap> {
    const settled = await Promise.allSettled(this.sources.map(s => s.fetchRates(base)));

    const maps: RateMap[] = settled.map((r, i) => {
      if (r.status === 'fulfilled') return r.value;
      const reason: unknown = r.reason;
      this.logger.warn(
        `${this.sources[i].name} failed for ${base}: ${reason instanceof Error ? reason.message : String(reason)}`,
      );
      return {};
    });

    const merged = mergeMaxRates(maps);
    for (const [code, rate] of Object.entries(merged)) {
      const cells = this.sources.map((s, i) => `${s.name}=${maps[i][code] ?? '-'}`).join(' ');
      this.logger.debug(`${base}:${code} ${cells} -> ${rate}`);
    }
    return merged;
  }
}
