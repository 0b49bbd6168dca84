// Shared quote domain types used by the providers, reconciler, cache and engine.
import type { QuoteSuccess } from '@fx-quotes/shared';
import type { CurrencyCode } from '../currencies/currency.registry';
import type { Problem } from './problems';

/** 1 unit of the base currency = `rates[code]` units of `code`. */
export type RateMap = Partial<Record<CurrencyCode, number>>;

export interface QuoteRequest {
  from_currency: string;
  to_currency: string;
  amount: string | number;
}

/** A request that passed validation, with its amount parsed. */
export interface ValidQuote {
  from: CurrencyCode;
  to: CurrencyCode;
  amount: number;
}

export interface CachedRate {
  base: CurrencyCode;
  quote: CurrencyCode;
  rate: number;
  asOf: string;
  /** epoch ms */
  expiresAt: number;
}

export interface RateSource {
  readonly name: string;
  fetchRates(base: CurrencyCode): Promise<RateMap>;
}

export type QuoteResult =
  | { ok: true; body: QuoteSuccess }
  | { ok: false; problems: Problem[] };

/** Injection token for the list of upstream rate sources. */
export const RATE_SOURCES = Symbol('RATE_SOURCES');
