import { Test, TestingModule } from '@nestjs/testing';
import { promises as fsp } from 'fs';
import * as path from 'path';
import { PIPELINE_CONFIG } from '../../../common/config/pipeline.config';
import { WriteError } from '../../../common/errors/pipeline.errors';
import { LoggerService } from '../../../common/services/logger.service';
import { FileStorageService } from '../../../common/storage/file-storage.service';
import { ParquetStorageService } from '../../../common/storage/parquet-storage.service';
import { makeBreweries, makeBrewery } from '../../testing/brewery.fixtures';
import {
  createLoggerMock,
  makeTempDir,
  testPipelineConfig,
} from '../../testing/test-helpers';
import { parseBronzeRow } from '../../validators/brewery.schema';
import { BronzeWriterService, toBronzeRow, toRawText } from './bronze-writer.service';

describe('BronzeWriterService', () => {
  let dataDir: string;

  async function createWriter(bronzeDir?: string) {
    const config = testPipelineConfig(dataDir);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BronzeWriterService,
        FileStorageService,
        ParquetStorageService,
        {
          provide: PIPELINE_CONFIG,
          useValue: bronzeDir
            ? { ...config, paths: { ...config.paths, bronzeDir } }
            : config,
        },
        { provide: LoggerService, useValue: createLoggerMock() },
      ],
    }).compile();

    return {
      writer: module.get<BronzeWriterService>(BronzeWriterService),
      parquet: module.get<ParquetStorageService>(ParquetStorageService),
    };
  }

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await fsp.rm(dataDir, { recursive: true, force: true });
  });

  describe('write', () => {
    it('should land every record of every page, duplicates included', async () => {
      const { writer, parquet } = await createWriter();

      const snapshot = await writer.write([
        { page: 1, records: makeBreweries(1, 50) },
        { page: 2, records: makeBreweries(48, 97) },
      ]);

      expect(snapshot).toEqual({
        path: path.join(dataDir, 'bronze', 'breweries_raw.parquet'),
        pageCount: 2,
        recordCount: 100,
      });

      const rows = (await parquet.read(snapshot.path)).map(parseBronzeRow);
      expect(rows).toHaveLength(100);
      expect(rows[0]).toMatchObject({ id: 'brewery-001', page: 1, position: 0 });
      expect(rows[50]).toMatchObject({ id: 'brewery-048', page: 2, position: 0 });
      expect(rows[99]).toMatchObject({ id: 'brewery-097', page: 2, position: 49 });
    });

    it('should keep values verbatim and nulls as nulls', async () => {
      const { writer, parquet } = await createWriter();
      const record = makeBrewery(7, { latitude: 35.25, longitude: null, extra: { a: 1 } });

      const snapshot = await writer.write([{ page: 1, records: [record] }]);

      const [row] = (await parquet.read(snapshot.path)).map(parseBronzeRow);
      expect(row.latitude).toBe('35.25');
      expect(row.longitude).toBeNull();
      expect(row.address_2).toBeNull();
      expect(row.name).toBe('Test Brewery 7');
      expect(JSON.parse(row.raw_json)).toEqual(record);
    });

    it('should leave no temporary files behind', async () => {
      const { writer } = await createWriter();

      await writer.write([{ page: 1, records: [makeBrewery(1)] }]);

      expect(await fsp.readdir(path.join(dataDir, 'bronze'))).toEqual([
        'breweries_raw.parquet',
      ]);
    });

    it('should raise WriteError when the destination is unwritable', async () => {
      const blocker = path.join(dataDir, 'blocked');
      await fsp.writeFile(blocker, 'not a directory');
      const { writer } = await createWriter(path.join(blocker, 'bronze'));

      const error = await writer
        .write([{ page: 1, records: [makeBrewery(1)] }])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteError);
      expect(error).toMatchObject({ stage: 'land', fatal: true });
    });
  });

  describe('toRawText', () => {
    it.each([
      [null, null],
      [undefined, null],
      ['None', 'None'],
      [-84.5, '-84.5'],
      [true, 'true'],
      [{ lat: 1 }, '{"lat":1}'],
    ])('should render %p as %p', (value, expected) => {
      expect(toRawText(value)).toBe(expected);
    });
  });

  describe('toBronzeRow', () => {
    it('should ignore fields the layout does not know, except in raw_json', () => {
      const row = toBronzeRow(makeBrewery(1, { unexpected: 'x' }), 3, 9);

      expect(row).not.toHaveProperty('unexpected');
      expect(row.page).toBe(3);
      expect(row.position).toBe(9);
      expect(row.raw_json).toContain('"unexpected":"x"');
    });
  });
});
