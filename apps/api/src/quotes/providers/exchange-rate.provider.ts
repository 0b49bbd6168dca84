import { Inject, Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import type { ConfigType } from '@nestjs/config';
import quotesConfig from '../../config/quotes.config';
import { CurrencyCode, CurrencyRegistry } from '../../currencies/currency.registry';
import { HttpRateSource, UpstreamRequest } from './http-rate.source';

// exchangerate-api.com: the base is the last path segment and every rate comes back.
@Injectable()
export class ExchangeRateApiProvider extends HttpRateSource {
  readonly name = 'exchangerate-api';

  constructor(
    http: HttpService,
    registry: CurrencyRegistry,
    @Inject(quotesConfig.KEY) config: ConfigType<typeof quotesConfig>,
  ) {
    super(http, registry, config);
  }

  protected buildRequest(base: CurrencyCode): UpstreamRequest {
    const root = this.config.upstream.exchangeRateUrl;
    return { url: `${root.endsWith('/') ? root : `${root}/`}${encodeURIComponent(base)}` };
  }
}
