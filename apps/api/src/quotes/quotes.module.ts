// Quote domain wired as one module: both upstream sources share one HTTP session.
import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule, ConfigType } from '@nestjs/config';
import quotesConfig from '../config/quotes.config';
import { CurrenciesModule } from '../currencies/currencies.module';
import { ExchangeRateApiProvider } from './providers/exchange-rate.provider';
import { FrankfurterProvider } from './providers/frankfurter.provider';
import { QuoteValidator } from './quote.validator';
import { QuotesController } from './quotes.controller';
import { QuotesService } from './quotes.service';
import { RateCache } from './rate.cache';
import { RateReconciler } from './rate.reconciler';
import { RATE_SOURCES, RateSource } from './types';

@Module({
  imports: [
    HttpModule.registerAsync({
      imports: [ConfigModule.forFeature(quotesConfig)],
      inject: [quotesConfig.KEY],
      useFactory: (cfg: ConfigType<typeof quotesConfig>) => ({
        timeout: cfg.upstream.timeoutMs,
        maxRedirects: 0,
      }),
    }),
    CurrenciesModule,
  ],
  controllers: [QuotesController],
  providers: [
    QuotesService,
    QuoteValidator,
    RateCache,
    RateReconciler,
    FrankfurterProvider,
    ExchangeRateApiProvider,
    {
      provide: RATE_SOURCES,
      inject: [FrankfurterProvider, ExchangeRateApiProvider],
      useFactory: (...sources: RateSource[]) => sources,
    },
  ],
  exports: [QuotesService],
})
export class QuotesModule {}
