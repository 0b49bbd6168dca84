// GET /quote: maps the engine's result onto HTTP status codes.
import { BadRequestException, Controller, Get, Header, Query, ServiceUnavailableException } from '@nestjs/common';
import type { QuoteError, QuoteSuccess } from '@fx-quotes/shared';
import { GetQuoteDto } from './dto/get-quote.dto';
import { describeProblem } from './problems';
import { QuotesService } from './quotes.service';

@Controller('quote')
export class QuotesController {
  constructor(private readonly quotes: QuotesService) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  async get(@Query() q: GetQuoteDto): Promise<QuoteSuccess> {
    const r = await this.quotes.getQuote({
      from_currency: q.from_currency_code ?? '',
      amount: q.amount ?? '',
      to_currency: q.to_currency_code ?? '',
    });
    if (r.ok) return r.body;

    if (r.problems.some(p => p.kind === 'SERVICE_DOWN')) {
      const down: QuoteError = { error: describeProblem({ kind: 'SERVICE_DOWN' }) };
      throw new ServiceUnavailableException(down);
    }
    const invalid: QuoteError = { error: r.problems.map(describeProblem) };
    throw new BadRequestException(invalid);
  }
}
