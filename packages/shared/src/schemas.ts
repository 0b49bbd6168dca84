import { z } from 'zod';

// Upstream providers answer `{ rates: { EUR: 0.84, ILS: "3.32", ... } }`; the
// values stay unknown here and are checked one by one by the consumer.
export const RatesPayloadSchema = z.object({
  rates: z.record(z.unknown()),
});

export const QuoteSuccessSchema = z.object({
  exchange_rate: z.string(),
  currency_code: z.string(),
  amount: z.string(),
});

export type QuoteSuccess = z.infer<typeof QuoteSuccessSchema>;

export const QuoteErrorSchema = z.object({
  error: z.union([z.string(), z.array(z.string())]),
});

export type QuoteError = z.infer<typeof QuoteErrorSchema>;
