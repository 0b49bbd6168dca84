import { Inject, Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import type { ConfigType } from '@nestjs/config';
import quotesConfig from '../../config/quotes.config';
import { CurrencyCode, CurrencyRegistry } from '../../currencies/currency.registry';
import { HttpRateSource, UpstreamRequest } from './http-rate.source';

// ECB reference rates; base and symbols travel as query parameters.
@Injectable()
export class FrankfurterProvider extends HttpRateSource {
  readonly name = 'frankfurter';

  constructor(
    http: HttpService,
    registry: CurrencyRegistry,
    @Inject(quotesConfig.KEY) config: ConfigType<typeof quotesConfig>,
  ) {
    super(http, registry, config);
  }

  protected buildRequest(base: CurrencyCode, symbols: CurrencyCode[]): UpstreamRequest {
    return {
      url: this.config.upstream.frankfurterUrl,
      params: { from: base, to: symbols.join(',') },
    };
  }
}
