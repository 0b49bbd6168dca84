import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import type { ConfigType } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { RatesPayloadSchema } from '@fx-quotes/shared';
import quotesConfig from '../../config/quotes.config';
import { CurrencyCode, CurrencyRegistry } from '../../currencies/currency.registry';
import { checkAmount, describeProblem } from '../problems';
import { RateMap, RateSource } from '../types';
import { RateSourceError } from './rate-source.error';

export interface UpstreamRequest {
  url: string;
  params?: Record<string, string>;
}

/**
 * One upstream provider behind a single GET. Subclasses only say where to ask;
 * parsing, filtering to the registry and dropping bad entries happen here.
 */
export abstract class HttpRateSource implements RateSource {
  abstract readonly name: string;
  protected readonly logger = new Logger(this.constructor.name);

  constructor(
    protected readonly http: HttpService,
    protected readonly registry: CurrencyRegistry,
    protected readonly config: ConfigType<typeof quotesConfig>,
  ) {}

  protected abstract buildRequest(base: CurrencyCode, symbols: CurrencyCode[]): UpstreamRequest;

  async fetchRates(base: CurrencyCode): Promise<RateMap> {
    const expected = this.registry.allExcept(base);
    const { url, params } = this.buildRequest(base, expected);

    let data: unknown;
    try {
      ({ data } = await firstValueFrom(
        this.http.get<unknown>(url, { params, timeout: this.config.upstream.timeoutMs }),
      ));
    } catch (e) {
      throw new RateSourceError(this.name, `request failed (${e instanceof Error ? e.message : String(e)})`, e);
    }

    const parsed = RatesPayloadSchema.safeParse(data);
    if (!parsed.success) {
      throw new RateSourceError(this.name, 'response carries no rates map', parsed.error);
    }

    const rates: RateMap = {};
    for (const code of expected) {
      const raw = parsed.data.rates[code];
      if (raw === undefined) {
        this.logger.warn(`${this.name}: ${describeProblem({ kind: 'MISSING_CURRENCY', currency: code })}`);
        continue;
      }
      const checked = checkAmount(raw);
      if ('problem' in checked) {
        this.logger.warn(`${this.name}: ${code} dropped. ${describeProblem(checked.problem)}`);
        continue;
      }
      rates[code] = checked.value;
    }

    const got = Object.keys(rates).length;
    if (got !== expected.length) {
      this.logger.warn(`${this.name}: ${got}/${expected.length} rates usable for ${base}`);
    }
    return rates;
  }
}
