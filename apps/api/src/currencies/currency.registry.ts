import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import quotesConfig from '../config/quotes.config';

export type CurrencyCode = string;

// Fixed set of supported codes, loaded once from configuration.
@Injectable()
export class CurrencyRegistry {
  private readonly codes: ReadonlySet<CurrencyCode>;

  constructor(@Inject(quotesConfig.KEY) config: ConfigType<typeof quotesConfig>) {
    this.codes = new Set(config.currencies);
  }

  isSupported(code: unknown): code is CurrencyCode {
    return typeof code === 'string' && this.codes.has(code);
  }

  /** Every registered code except `code`, in registry order. */
  allExcept(code: CurrencyCode): CurrencyCode[] {
    return [...this.codes].filter(c => c !== code);
  }

  list(): CurrencyCode[] {
    return [...this.codes];
  }

  get size(): number {
    return this.codes.size;
  }
}
