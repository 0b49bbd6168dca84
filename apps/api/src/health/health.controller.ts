import { Controller, Get } from '@nestjs/common';
import { CurrencyRegistry } from '../currencies/currency.registry';

@Controller()
export class HealthController {
  constructor(private readonly registry: CurrencyRegistry) {}

  @Get('/')
  root() {
    return { service: 'fx-quotes', status: 'ok' };
  }

  @Get('/health')
  health() {
    return { status: 'ok', currencies: this.registry.size };
  }
}
