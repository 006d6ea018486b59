import { Inject, Injectable } from '@nestjs/common';
import { ParquetSchema } from '@dsnp/parquetjs';
import * as path from 'path';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '../../../common/config/pipeline.config';
import { LoggerService } from '../../../common/services/logger.service';
import { ParquetStorageService } from '../../../common/storage/parquet-storage.service';
import {
  BREWERY_FIELDS,
  BreweryField,
  BreweryRecord,
  BronzeRow,
  BronzeSnapshot,
  RawPage,
} from '../../interfaces/brewery.interface';

export const BRONZE_FILE = 'breweries_raw.parquet';

export const BRONZE_SCHEMA = new ParquetSchema({
  ...Object.fromEntries(
    BREWERY_FIELDS.map((field) => [field, { type: 'UTF8', optional: true } as const]),
  ),
  page: { type: 'INT32' },
  position: { type: 'INT32' },
  raw_json: { type: 'UTF8' },
});

/**
 * Render a source value as text without interpreting it.
 * Objects and arrays keep their JSON form.
 */
export function toRawText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return String(value);
  }
  return JSON.stringify(value);
}

export function toBronzeRow(
  record: BreweryRecord,
  page: number,
  position: number,
): BronzeRow {
  const text = (field: BreweryField) => toRawText(record[field]);

  return {
    id: text('id'),
    name: text('name'),
    brewery_type: text('brewery_type'),
    address_1: text('address_1'),
    address_2: text('address_2'),
    address_3: text('address_3'),
    street: text('street'),
    city: text('city'),
    state_province: text('state_province'),
    state: text('state'),
    postal_code: text('postal_code'),
    country: text('country'),
    longitude: text('longitude'),
    latitude: text('latitude'),
    phone: text('phone'),
    website_url: text('website_url'),
    page,
    position,
    raw_json: JSON.stringify(record),
  };
}

/**
 * Raw Landing Writer
 * Lands every fetched page, untouched, as the bronze Parquet snapshot
 */
@Injectable()
export class BronzeWriterService {
  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly parquet: ParquetStorageService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(BronzeWriterService.name);
  }

  get snapshotPath(): string {
    return path.join(this.config.paths.bronzeDir, BRONZE_FILE);
  }

  async write(pages: RawPage[]): Promise<BronzeSnapshot> {
    const rows = pages.flatMap(({ page, records }) =>
      records.map((record, position) => toBronzeRow(record, page, position)),
    );

    await this.parquet.write('land', this.snapshotPath, BRONZE_SCHEMA, rows);

    this.logger.log(
      `Landed ${rows.length} records from ${pages.length} pages at ${this.snapshotPath}`,
    );

    return {
      path: this.snapshotPath,
      pageCount: pages.length,
      recordCount: rows.length,
    };
  }
}
