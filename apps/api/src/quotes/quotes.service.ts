// Quote orchestration: validate, obtain a rate (cache first), convert, format.
import { Injectable, Logger } from '@nestjs/common';
import { QuoteValidator } from './quote.validator';
import { RateCache } from './rate.cache';
import { checkAmount } from './problems';
import { formatFixed } from './decimal';
import { QuoteRequest, QuoteResult } from './types';

@Injectable()
export class QuotesService {
  private readonly logger = new Logger(QuotesService.name);

  constructor(
    private readonly validator: QuoteValidator,
    private readonly rates: RateCache,
  ) {}

  async getQuote(req: QuoteRequest): Promise<QuoteResult> {
    this.logger.debug(`request ${JSON.stringify(req)}`);

    const parsed = this.validator.parse(req);
    if (!parsed.ok) return { ok: false, problems: parsed.problems };
    const { from, to, amount } = parsed.quote;

    let rate: unknown;
    if (from === to) {
      rate = 1;
    } else {
      try {
        rate = await this.rates.getOrRefresh(from, to);
      } catch (e) {
        this.logger.error(`rate lookup ${from}:${to} failed`, e instanceof Error ? e.stack : String(e));
        return { ok: false, problems: [{ kind: 'SERVICE_DOWN' }] };
      }
    }

    const checked = checkAmount(rate);
    if ('problem' in checked) {
      this.logger.warn(`no usable rate for ${from}:${to}`);
      return { ok: false, problems: [{ kind: 'SERVICE_DOWN' }] };
    }

    const converted = amount * checked.value;
    if (!Number.isFinite(converted)) {
      return { ok: false, problems: [{ kind: 'NOT_A_NUMBER', amount: req.amount }] };
    }

    const body = {
      exchange_rate: formatFixed(checked.value, 3),
      currency_code: to,
      amount: formatFixed(converted, 5),
    };
    this.logger.debug(`response ${JSON.stringify(body)}`);
    return { ok: true, body };
  }
}
