// Closed set of failure kinds a quote can report, each with its own message.
export type Problem =
  | { kind: 'MISSING_CURRENCY'; currency: string }
  | { kind: 'SERVICE_DOWN' }
  | { kind: 'NOT_A_NUMBER'; amount: unknown }
  | { kind: 'NOT_POSITIVE'; amount: unknown }
  | { kind: 'FROM_CURRENCY'; currency: unknown }
  | { kind: 'TO_CURRENCY'; currency: unknown };

export function describeProblem(p: Problem): string {
  switch (p.kind) {
    case 'MISSING_CURRENCY':
      return `The exchange rate for ${p.currency} is missing.`;
    case 'SERVICE_DOWN':
      return 'The service is temporarily down for maintenance.';
    case 'NOT_A_NUMBER':
      return `The specified 'amount'=${String(p.amount)} is not a number. Please specify a positive numeric value.`;
    case 'NOT_POSITIVE':
      return `The specified 'amount'=${String(p.amount)} is not a positive number.`;
    case 'FROM_CURRENCY':
      return `The 'from_currency_code'=${String(p.currency)} is not supported.`;
    case 'TO_CURRENCY':
      return `The 'to_currency_code'=${String(p.currency)} is not supported.`;
  }
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Shared positive-amount rule for request amounts and upstream rates.
 * Returns the parsed value, or the problem that rejects it.
 */
export function checkAmount(amount: unknown): { value: number } | { problem: Problem } {
  let value: number;
  if (typeof amount === 'number') {
    value = amount;
  } else if (typeof amount === 'string' && DECIMAL.test(amount.trim())) {
    value = Number(amount.trim());
  } else {
    return { problem: { kind: 'NOT_A_NUMBER', amount } };
  }

  if (!Number.isFinite(value)) return { problem: { kind: 'NOT_A_NUMBER', amount } };
  if (value <= 0) return { problem: { kind: 'NOT_POSITIVE', amount } };
  return { value };
}
