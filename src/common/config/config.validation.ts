import { plainToInstance, Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  // Logging
  @IsString()
  @IsOptional()
  LOG_LEVEL = 'info';

  // Source API
  @IsUrl({ require_tld: false })
  @IsOptional()
  BREWERY_API_URL = 'https://api.openbrewerydb.org/v1/breweries';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(200)
  @IsOptional()
  BREWERY_PAGE_SIZE = 200;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @IsOptional()
  BREWERY_MAX_PAGES = 0;

  @IsString()
  @IsOptional()
  BREWERY_API_USER_AGENT = 'brewery-elt/1.0';

  // Fetch retries
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  FETCH_TIMEOUT_MS = 10000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  @IsOptional()
  FETCH_MAX_ATTEMPTS = 3;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @IsOptional()
  FETCH_RETRY_DELAY_MS = 1000;

  // Output layers
  @IsString()
  @IsOptional()
  DATA_DIR = 'data';

  @IsString()
  @IsOptional()
  BRONZE_DIR?: string;

  @IsString()
  @IsOptional()
  SILVER_DIR?: string;

  @IsString()
  @IsOptional()
  GOLD_DIR?: string;

  @IsString()
  @IsOptional()
  SILVER_COUNTRY_FILTER?: string;
}

export function configValidation(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints;
        return constraints ? Object.values(constraints).join(', ') : '';
      })
      .filter(Boolean)
      .join('; ');

    throw new Error(`Config validation error: ${errorMessages}`);
  }

  return validatedConfig;
}
