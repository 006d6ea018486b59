import { Test, TestingModule } from '@nestjs/testing';
import { promises as fsp } from 'fs';
import * as path from 'path';
import { PIPELINE_CONFIG } from '../../common/config/pipeline.config';
import { WriteError } from '../../common/errors/pipeline.errors';
import { LoggerService } from '../../common/services/logger.service';
import { FileStorageService } from '../../common/storage/file-storage.service';
import { GoldTables } from '../interfaces/brewery.interface';
import {
  createLoggerMock,
  makeTempDir,
  testPipelineConfig,
} from '../testing/test-helpers';
import { GoldWriterService, toCsv } from './gold-writer.service';

const GOLD: GoldTables = {
  factBreweries: [
    {
      brewery_id: 'a',
      name: 'HOP, YARD',
      location_key: 1,
      type_key: 1,
      latitude: 30.3,
      longitude: -97.7,
      brewery_count: 1,
    },
    {
      brewery_id: 'b',
      name: 'B',
      location_key: 0,
      type_key: 0,
      latitude: null,
      longitude: null,
      brewery_count: 1,
    },
  ],
  dimLocation: [
    { location_key: 0, city: null, state: null, country: null },
    { location_key: 1, city: 'Austin', state: 'Texas', country: 'United States' },
  ],
  dimBreweryType: [
    { type_key: 0, brewery_type: 'unknown' },
    { type_key: 1, brewery_type: 'micro' },
  ],
};

describe('GoldWriterService', () => {
  let dataDir: string;

  async function createWriter(goldDir?: string): Promise<GoldWriterService> {
    const config = testPipelineConfig(dataDir);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GoldWriterService,
        FileStorageService,
        {
          provide: PIPELINE_CONFIG,
          useValue: goldDir ? { ...config, paths: { ...config.paths, goldDir } } : config,
        },
        { provide: LoggerService, useValue: createLoggerMock() },
      ],
    }).compile();
    return module.get(GoldWriterService);
  }

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await fsp.rm(dataDir, { recursive: true, force: true });
  });

  it('should write one CSV with a header per table', async () => {
    const writer = await createWriter();

    const artifacts = await writer.write(GOLD);

    const goldDir = path.join(dataDir, 'gold');
    expect(artifacts).toEqual({
      fact_breweries: { path: path.join(goldDir, 'fact_breweries.csv'), rows: 2 },
      dim_location: { path: path.join(goldDir, 'dim_location.csv'), rows: 2 },
      dim_brewery_type: { path: path.join(goldDir, 'dim_brewery_type.csv'), rows: 2 },
    });
    expect(await fsp.readFile(artifacts.fact_breweries.path, 'utf8')).toBe(
      'brewery_id,name,location_key,type_key,latitude,longitude,brewery_count\n' +
        'a,"HOP, YARD",1,1,30.3,-97.7,1\n' +
        'b,B,0,0,,,1\n',
    );
    expect(await fsp.readFile(artifacts.dim_location.path, 'utf8')).toBe(
      'location_key,city,state,country\n' + '0,,,\n' + '1,Austin,Texas,United States\n',
    );
    expect(await fsp.readFile(artifacts.dim_brewery_type.path, 'utf8')).toBe(
      'type_key,brewery_type\n' + '0,unknown\n' + '1,micro\n',
    );
    expect((await fsp.readdir(goldDir)).sort()).toEqual([
      'dim_brewery_type.csv',
      'dim_location.csv',
      'fact_breweries.csv',
    ]);
  });

  it('should overwrite the previous run with identical bytes for identical input', async () => {
    const writer = await createWriter();

    const first = await writer.write(GOLD);
    const before = await fsp.readFile(first.fact_breweries.path);
    await writer.write(GOLD);

    expect((await fsp.readFile(first.fact_breweries.path)).equals(before)).toBe(true);
  });

  it('should raise WriteError and publish nothing when the directory is unwritable', async () => {
    const blocker = path.join(dataDir, 'blocked');
    await fsp.writeFile(blocker, '');
    const writer = await createWriter(path.join(blocker, 'gold'));

    await expect(writer.write(GOLD)).rejects.toBeInstanceOf(WriteError);
    expect(await fsp.readdir(dataDir)).toEqual(['blocked']);
  });

  it('should keep the previous tables when one of them cannot be replaced', async () => {
    const goldDir = path.join(dataDir, 'gold');
    const locations = path.join(goldDir, 'dim_location.csv');
    await fsp.mkdir(locations, { recursive: true });
    await fsp.writeFile(path.join(locations, 'keep'), '');
    await fsp.writeFile(path.join(goldDir, 'fact_breweries.csv'), 'OLD');
    const writer = await createWriter();

    const error = await writer.write(GOLD).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({
      stage: 'publish',
      target: locations,
      message: `Failed to write ${locations}: ${locations} is not a regular file`,
    });
    expect(await fsp.readFile(path.join(goldDir, 'fact_breweries.csv'), 'utf8')).toBe('OLD');
    expect((await fsp.readdir(goldDir)).sort()).toEqual(['dim_location.csv', 'fact_breweries.csv']);
  });

  describe('toCsv', () => {
    it('should only emit the requested columns, in order', () => {
      expect(
        toCsv([{ b: 2, a: 1, c: 'skip' }], ['a', 'b']),
      ).toBe('a,b\n1,2\n');
    });
  });
});
