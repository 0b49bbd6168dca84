import { Module } from '@nestjs/common';
import { CurrenciesController } from './currencies.controller';
import { CurrencyRegistry } from './currency.registry';

@Module({
  controllers: [CurrenciesController],
  providers: [CurrencyRegistry],
  exports: [CurrencyRegistry],
})
export class CurrenciesModule {}
