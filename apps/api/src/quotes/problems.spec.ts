import { checkAmount, describeProblem } from './problems';

describe('describeProblem', () => {
  it('formats every kind', () => {
    expect(describeProblem({ kind: 'MISSING_CURRENCY', currency: 'ILS' })).toBe('The exchange rate for ILS is missing.');
    expect(describeProblem({ kind: 'SERVICE_DOWN' })).toBe('The service is temporarily down for maintenance.');
    expect(describeProblem({ kind: 'NOT_A_NUMBER', amount: 'abc' })).toBe(
      "The specified 'amount'=abc is not a number. Please specify a positive numeric value.",
    );
    expect(describeProblem({ kind: 'NOT_POSITIVE', amount: '-5' })).toBe(
      "The specified 'amount'=-5 is not a positive number.",
    );
    expect(describeProblem({ kind: 'FROM_CURRENCY', currency: 'XXX' })).toBe(
      "The 'from_currency_code'=XXX is not supported.",
    );
    expect(describeProblem({ kind: 'TO_CURRENCY', currency: 'YYY' })).toBe(
      "The 'to_currency_code'=YYY is not supported.",
    );
  });
});

describe('checkAmount', () => {
  it.each([
    ['100', 100],
    [' 2.5 ', 2.5],
    ['.5', 0.5],
    ['1e3', 1000],
    [0.84, 0.84],
  ])('accepts %p', (input, expected) => {
    expect(checkAmount(input)).toEqual({ value: expected });
  });

  it.each(['abc', '', '0x10', 'Infinity', 'NaN', '1,000', null, undefined, {}, Number.NaN, Number.POSITIVE_INFINITY])(
    'reports %p as not a number',
    input => {
      expect(checkAmount(input)).toEqual({ problem: { kind: 'NOT_A_NUMBER', amount: input } });
    },
  );

  it.each(['0', '-5', 0, -0.1])('reports %p as not positive', input => {
    expect(checkAmount(input)).toEqual({ problem: { kind: 'NOT_POSITIVE', amount: input } });
  });
});
