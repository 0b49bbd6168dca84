import { Controller, Get } from '@nestjs/common';
import { CurrencyRegistry } from './currency.registry';

@Controller('currencies')
export class CurrenciesController {
  constructor(private readonly registry: CurrencyRegistry) {}

  @Get()
  list() {
    return { currencies: this.registry.list() };
  }
}
