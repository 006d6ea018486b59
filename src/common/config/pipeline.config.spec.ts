import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { buildPipelineConfig } from './pipeline.config';

describe('buildPipelineConfig', () => {
  const cwd = path.resolve('/srv/brewery-elt');

  it('should lay the layers out under the data directory', () => {
    const config = buildPipelineConfig(new ConfigService({ DATA_DIR: 'out' }), cwd);

    expect(config.paths).toEqual({
      bronzeDir: path.join(cwd, 'out', 'bronze'),
      silverDir: path.join(cwd, 'out', 'silver'),
      goldDir: path.join(cwd, 'out', 'gold'),
    });
    expect(config.countryFilter).toBeNull();
  });

  it('should honour per-layer overrides and the country filter', () => {
    const config = buildPipelineConfig(
      new ConfigService({
        DATA_DIR: 'out',
        GOLD_DIR: '/exports/bi',
        SILVER_COUNTRY_FILTER: ' United States ',
      }),
      cwd,
    );

    expect(config.paths.goldDir).toBe(path.resolve('/exports/bi'));
    expect(config.paths.bronzeDir).toBe(path.join(cwd, 'out', 'bronze'));
    expect(config.countryFilter).toBe('United States');
  });

  it('should carry the source settings and be frozen', () => {
    const config = buildPipelineConfig(
      new ConfigService({
        BREWERY_API_URL: 'http://localhost:8080/breweries',
        BREWERY_PAGE_SIZE: 25,
        FETCH_MAX_ATTEMPTS: 5,
      }),
      cwd,
    );

    expect(config.source).toMatchObject({
      baseUrl: 'http://localhost:8080/breweries',
      pageSize: 25,
      maxAttempts: 5,
      retryDelayMs: 1000,
      maxPages: 0,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.source)).toBe(true);
  });
});
