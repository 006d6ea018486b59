import { Inject, Injectable } from '@nestjs/common';
import { ParquetSchema } from '@dsnp/parquetjs';
import * as path from 'path';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '../../common/config/pipeline.config';
import {
  describeCause,
  TransformError,
  ValidationError,
} from '../../common/errors/pipeline.errors';
import { LoggerService } from '../../common/services/logger.service';
import { ParquetStorageService } from '../../common/storage/parquet-storage.service';
import {
  BronzeRow,
  BronzeSnapshot,
  SilverBrewery,
  SilverStats,
  SilverTable,
} from '../interfaces/brewery.interface';
import { BronzeRowSchema } from '../validators/brewery.schema';

export const SILVER_FILE = 'breweries.parquet';

const optionalText = { type: 'UTF8', optional: true } as const;
const optionalDouble = { type: 'DOUBLE', optional: true } as const;

export const SILVER_SCHEMA = new ParquetSchema({
  brewery_id: { type: 'UTF8' },
  name: { type: 'UTF8' },
  brewery_type: optionalText,
  address: { type: 'UTF8' },
  city: optionalText,
  state: optionalText,
  postal_code: optionalText,
  country: optionalText,
  longitude: optionalDouble,
  latitude: optionalDouble,
  phone: optionalText,
  website_url: optionalText,
});

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const UNKNOWN_ADDRESS = 'Unknown';

function clean(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Parse a decimal coordinate. Anything that is not a plain decimal number
 * within ±limit (including "None", "nan" and hex) yields null.
 */
export function parseCoordinate(value: string | null, limit: number): number | null {
  const text = clean(value);
  if (text === null || !DECIMAL.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) && Math.abs(parsed) <= limit ? parsed : null;
}

/** A coordinate pair is kept whole or nulled whole. */
export function parseCoordinates(row: Pick<BronzeRow, 'latitude' | 'longitude'>): {
  latitude: number | null;
  longitude: number | null;
} {
  const latitude = parseCoordinate(row.latitude, 90);
  const longitude = parseCoordinate(row.longitude, 180);
  if (latitude === null || longitude === null) {
    return { latitude: null, longitude: null };
  }
  return { latitude, longitude };
}

export function toSilverRow(row: BronzeRow): SilverBrewery | ValidationError {
  const id = clean(row.id);
  const record = { page: row.page, position: row.position, id };
  if (id === null) {
    return new ValidationError('missing_id', record);
  }

  const name = clean(row.name);
  if (name === null) {
    return new ValidationError('missing_name', record);
  }

  return {
    brewery_id: id,
    name: name.toUpperCase(),
    brewery_type: clean(row.brewery_type)?.toLowerCase() ?? null,
    address: clean(row.address_1) ?? clean(row.street) ?? UNKNOWN_ADDRESS,
    city: clean(row.city),
    state: clean(row.state_province) ?? clean(row.state),
    postal_code: clean(row.postal_code),
    country: clean(row.country),
    ...parseCoordinates(row),
    phone: clean(row.phone),
    website_url: clean(row.website_url),
  };
}

/** Orders by Unicode code point; `<` would compare UTF-16 code units. */
export function compareText(a: string, b: string): number {
  let index = 0;
  while (index < a.length && index < b.length) {
    const left = a.codePointAt(index) ?? 0;
    const right = b.codePointAt(index) ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    index += left > 0xffff ? 2 : 1;
  }
  if (a.length === b.length) {
    return 0;
  }
  return a.length < b.length ? -1 : 1;
}

export interface CleansingResult {
  rows: SilverBrewery[];
  rejected: ValidationError[];
  stats: SilverStats;
}

/**
 * Drop invalid rows, keep the last-fetched row per brewery id, apply the
 * optional country filter, and sort by brewery id.
 */
export function cleanseRows(
  bronze: readonly BronzeRow[],
  countryFilter: string | null = null,
): CleansingResult {
  const ordered = [...bronze].sort(
    (a, b) => a.page - b.page || a.position - b.position,
  );

  const rejected: ValidationError[] = [];
  const latest = new Map<string, SilverBrewery>();
  let validRows = 0;

  for (const row of ordered) {
    const result = toSilverRow(row);
    if (result instanceof ValidationError) {
      rejected.push(result);
      continue;
    }
    validRows++;
    latest.set(result.brewery_id, result);
  }

  const wantedCountry = countryFilter?.toLowerCase() ?? null;
  const unique = [...latest.values()];
  const rows = unique
    .filter(
      (row) => wantedCountry === null || row.country?.toLowerCase() === wantedCountry,
    )
    .sort((a, b) => compareText(a.brewery_id, b.brewery_id));

  return {
    rows,
    rejected,
    stats: {
      inputRows: bronze.length,
      droppedInvalid: rejected.length,
      droppedByCountry: unique.length - rows.length,
      duplicatesRemoved: validRows - unique.length,
      coordinatesNulled: rows.filter((row) => row.latitude === null).length,
      outputRows: rows.length,
    },
  };
}

/**
 * Cleansing Transform
 * Turns the bronze snapshot into the silver table
 */
@Injectable()
export class CleansingService {
  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly parquet: ParquetStorageService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(CleansingService.name);
  }

  get tablePath(): string {
    return path.join(this.config.paths.silverDir, SILVER_FILE);
  }

  async cleanse(snapshot: BronzeSnapshot): Promise<SilverTable> {
    const bronze = await this.readSnapshot(snapshot);
    const { rows, rejected, stats } = cleanseRows(bronze, this.config.countryFilter);

    if (rejected.length > 0) {
      for (const error of rejected) {
        this.logger.debug(error.message);
      }
      this.logger.logBusinessEvent(
        'records-dropped',
        {
          missingId: rejected.filter((e) => e.reason === 'missing_id').length,
          missingName: rejected.filter((e) => e.reason === 'missing_name').length,
        },
        `Dropped ${rejected.length} records failing mandatory-field checks`,
      );
    }

    await this.parquet.write('cleanse', this.tablePath, SILVER_SCHEMA, rows);

    this.logger.log(
      `Silver table has ${stats.outputRows} of ${stats.inputRows} bronze rows (${stats.duplicatesRemoved} duplicates removed)`,
    );

    return { path: this.tablePath, rows, stats };
  }

  private async readSnapshot(snapshot: BronzeSnapshot): Promise<BronzeRow[]> {
    let raw: unknown[];
    try {
      raw = await this.parquet.read(snapshot.path);
    } catch (error) {
      throw new TransformError(
        'cleanse',
        `Cannot read bronze snapshot ${snapshot.path}: ${describeCause(error)}`,
        { cause: error },
      );
    }

    if (raw.length !== snapshot.recordCount) {
      throw new TransformError(
        'cleanse',
        `Bronze snapshot ${snapshot.path} holds ${raw.length} rows, expected ${snapshot.recordCount}`,
      );
    }

    return raw.map((value, index) => {
      const parsed = BronzeRowSchema.safeParse(value);
      if (!parsed.success) {
        throw new TransformError(
          'cleanse',
          `Bronze row ${index} does not match the landed layout: ${parsed.error.message}`,
        );
      }
      return parsed.data;
    });
  }
}
