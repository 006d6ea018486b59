import { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

export interface SourceConfig {
  baseUrl: string;
  pageSize: number;
  /** 0 means "until the source returns an empty page" */
  maxPages: number;
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface LayerPaths {
  bronzeDir: string;
  silverDir: string;
  goldDir: string;
}

export interface PipelineConfig {
  readonly source: Readonly<SourceConfig>;
  readonly paths: Readonly<LayerPaths>;
  readonly countryFilter: string | null;
}

function optionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Fold the validated environment into the immutable value every stage receives.
 * Relative directories resolve against the working directory.
 */
export function buildPipelineConfig(
  config: ConfigService,
  cwd: string = process.cwd(),
): PipelineConfig {
  const dataDir = path.resolve(cwd, config.get<string>('DATA_DIR', 'data'));
  const layerDir = (key: string, fallback: string) => {
    const override = optionalString(config.get<string>(key));
    return override ? path.resolve(cwd, override) : path.join(dataDir, fallback);
  };

  return Object.freeze({
    source: Object.freeze({
      baseUrl: config.get<string>(
        'BREWERY_API_URL',
        'https://api.openbrewerydb.org/v1/breweries',
      ),
      pageSize: config.get<number>('BREWERY_PAGE_SIZE', 200),
      maxPages: config.get<number>('BREWERY_MAX_PAGES', 0),
      userAgent: config.get<string>('BREWERY_API_USER_AGENT', 'brewery-elt/1.0'),
      timeoutMs: config.get<number>('FETCH_TIMEOUT_MS', 10000),
      maxAttempts: config.get<number>('FETCH_MAX_ATTEMPTS', 3),
      retryDelayMs: config.get<number>('FETCH_RETRY_DELAY_MS', 1000),
    }),
    paths: Object.freeze({
      bronzeDir: layerDir('BRONZE_DIR', 'bronze'),
      silverDir: layerDir('SILVER_DIR', 'silver'),
      goldDir: layerDir('GOLD_DIR', 'gold'),
    }),
    countryFilter: optionalString(config.get<string>('SILVER_COUNTRY_FILTER')),
  });
}

export const pipelineConfigProvider: FactoryProvider<PipelineConfig> = {
  provide: PIPELINE_CONFIG,
  inject: [ConfigService],
  useFactory: (config: ConfigService) => buildPipelineConfig(config),
};
