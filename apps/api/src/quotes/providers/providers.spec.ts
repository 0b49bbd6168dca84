import { Test } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { of, throwError } from 'rxjs';
import quotesConfig, { buildQuotesConfig } from '../../config/quotes.config';
import { CurrencyRegistry } from '../../currencies/currency.registry';
import { ExchangeRateApiProvider } from './exchange-rate.provider';
import { FrankfurterProvider } from './frankfurter.provider';
import { RateSourceError } from './rate-source.error';

describe('rate source providers', () => {
  let http: { get: jest.Mock };
  let frankfurter: FrankfurterProvider;
  let exchangeRate: ExchangeRateApiProvider;

  beforeEach(async () => {
    http = { get: jest.fn() };

    const module = await Test.createTestingModule({
      providers: [
        FrankfurterProvider,
        ExchangeRateApiProvider,
        CurrencyRegistry,
        { provide: HttpService, useValue: http },
        {
          provide: quotesConfig.KEY,
          useValue: buildQuotesConfig({
            SUPPORTED_CURRENCIES: 'USD,EUR,ILS',
            FX_TIMEOUT_MS: '1500',
            FRANKFURTER_URL: 'https://rates.test/latest',
            EXCHANGE_RATE_URL: 'https://other.test/v4/latest',
          }),
        },
      ],
    }).compile();

    frankfurter = module.get(FrankfurterProvider);
    exchangeRate = module.get(ExchangeRateApiProvider);
  });

  it('asks frankfurter with query parameters and the configured timeout', async () => {
    http.get.mockReturnValue(of({ data: { base: 'USD', rates: { EUR: 0.8, ILS: 3.3 } } }));

    await expect(frankfurter.fetchRates('USD')).resolves.toEqual({ EUR: 0.8, ILS: 3.3 });
    expect(http.get).toHaveBeenCalledWith('https://rates.test/latest', {
      params: { from: 'USD', to: 'EUR,ILS' },
      timeout: 1500,
    });
  });

  it('asks exchangerate-api with the base as a path segment', async () => {
    http.get.mockReturnValue(of({ data: { rates: { USD: 1, EUR: 0.84, ILS: 3.32 } } }));

    await expect(exchangeRate.fetchRates('USD')).resolves.toEqual({ EUR: 0.84, ILS: 3.32 });
    expect(http.get).toHaveBeenCalledWith('https://other.test/v4/latest/USD', {
      params: undefined,
      timeout: 1500,
    });
  });

  it('drops currencies outside the registry', async () => {
    http.get.mockReturnValue(of({ data: { rates: { EUR: 0.84, ILS: 3.32, GBP: 0.7, JPY: 150 } } }));

    await expect(exchangeRate.fetchRates('USD')).resolves.toEqual({ EUR: 0.84, ILS: 3.32 });
  });

  it('parses numeric strings', async () => {
    http.get.mockReturnValue(of({ data: { rates: { EUR: '0.84', ILS: ' 3.32' } } }));

    await expect(frankfurter.fetchRates('USD')).resolves.toEqual({ EUR: 0.84, ILS: 3.32 });
  });

  it('drops invalid and missing entries without failing', async () => {
    http.get.mockReturnValue(of({ data: { rates: { EUR: 'n/a' } } }));
    await expect(frankfurter.fetchRates('USD')).resolves.toEqual({});

    http.get.mockReturnValue(of({ data: { rates: { EUR: -1, ILS: 3.3 } } }));
    await expect(frankfurter.fetchRates('USD')).resolves.toEqual({ ILS: 3.3 });
  });

  it('fails on a transport error', async () => {
    http.get.mockReturnValue(throwError(() => new Error('timeout of 1500ms exceeded')));

    const err: unknown = await frankfurter.fetchRates('USD').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateSourceError);
    if (err instanceof RateSourceError) {
      expect(err.message).toBe('frankfurter: request failed (timeout of 1500ms exceeded)');
      expect(err.source).toBe('frankfurter');
      expect(err.cause).toEqual(new Error('timeout of 1500ms exceeded'));
    }
  });

  it('fails when the body has no rates map', async () => {
    http.get.mockReturnValue(of({ data: '<html>maintenance</html>' }));
    await expect(exchangeRate.fetchRates('USD')).rejects.toBeInstanceOf(RateSourceError);

    http.get.mockReturnValue(of({ data: { result: 'error' } }));
    await expect(exchangeRate.fetchRates('USD')).rejects.toThrow(
      'exchangerate-api: response carries no rates map',
    );
  });
});
