import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsString, IsUrl, Matches, Max, Min, validateSync } from 'class-validator';

const CURRENCY_LIST = /^[A-Z]{3}(,[A-Z]{3})+$/;

class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  PORT: number = 4000;

  @IsString()
  @IsOptional()
  GLOBAL_PREFIX: string = 'v1';

  @Matches(CURRENCY_LIST, { message: 'SUPPORTED_CURRENCIES must be a comma list of at least two 3-letter codes' })
  @IsOptional()
  SUPPORTED_CURRENCIES: string = 'USD,EUR,ILS';

  @IsString()
  @IsOptional()
  REDIS_HOST?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  REDIS_PORT: number = 6379;

  @IsInt()
  @Min(1)
  @IsOptional()
  CACHE_LIFE_TIME: number = 10;

  @IsInt()
  @Min(1)
  @IsOptional()
  FX_TIMEOUT_MS: number = 2500;

  @IsUrl({ require_tld: false })
  @IsOptional()
  FRANKFURTER_URL: string = 'https://api.frankfurter.app/latest';

  @IsUrl({ require_tld: false })
  @IsOptional()
  EXCHANGE_RATE_URL: string = 'https://api.exchangerate-api.com/v4/latest/';
}

export type Environment = EnvironmentVariables;

export function validate(config: Record<string, unknown>): Environment {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  const codes = validated.SUPPORTED_CURRENCIES.split(',');
  const duplicates = codes.filter((code, i) => codes.indexOf(code) !== i);
  if (duplicates.length > 0) {
    throw new Error(`Duplicate currency codes in SUPPORTED_CURRENCIES: ${[...new Set(duplicates)].join(', ')}`);
  }

  return validated;
}
