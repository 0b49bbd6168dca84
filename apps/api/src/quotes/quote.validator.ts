import { Injectable } from '@nestjs/common';
import { CurrencyRegistry } from '../currencies/currency.registry';
import { checkAmount, Problem } from './problems';
import { QuoteRequest, ValidQuote } from './types';

@Injectable()
export class QuoteValidator {
  constructor(private readonly registry: CurrencyRegistry) {}

  // All checks run; an empty list means the request is valid.
  validate(req: QuoteRequest): Problem[] {
    const parsed = this.parse(req);
    return parsed.ok ? [] : parsed.problems;
  }

  parse(req: QuoteRequest): { ok: true; quote: ValidQuote } | { ok: false; problems: Problem[] } {
    const problems: Problem[] = [];

    const amount = checkAmount(req.amount);
    if ('problem' in amount) problems.push(amount.problem);

    if (!this.registry.isSupported(req.from_currency)) {
      problems.push({ kind: 'FROM_CURRENCY', currency: req.from_currency });
    }
    if (!this.registry.isSupported(req.to_currency)) {
      problems.push({ kind: 'TO_CURRENCY', currency: req.to_currency });
    }

    if (problems.length > 0 || 'problem' in amount) return { ok: false, problems };
    return { ok: true, quote: { from: req.from_currency, to: req.to_currency, amount: amount.value } };
  }
}
