import { IsOptional, IsString } from 'class-validator';

// Query parameters are forwarded as received; the quote engine judges their values.
export class GetQuoteDto {
  @IsOptional()
  @IsString({ message: "The 'from_currency_code' must be given once." })
  from_currency_code?: string;

  @IsOptional()
  @IsString({ message: "The 'amount' must be given once." })
  amount?: string;

  @IsOptional()
  @IsString({ message: "The 'to_currency_code' must be given once." })
  to_currency_code?: string;
}
