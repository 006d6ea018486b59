import { Inject, Injectable } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';
import { promises as fsp } from 'fs';
import * as path from 'path';
import {
  PIPELINE_CONFIG,
  PipelineConfig,
} from '../../common/config/pipeline.config';
import { LoggerService } from '../../common/services/logger.service';
import { FileStorageService } from '../../common/storage/file-storage.service';
import {
  DimBreweryType,
  DimLocation,
  FactBrewery,
  GoldArtifacts,
  GoldTableName,
  GoldTables,
} from '../interfaces/brewery.interface';

export const FACT_BREWERIES_COLUMNS: (keyof FactBrewery)[] = [
  'brewery_id',
  'name',
  'location_key',
  'type_key',
  'latitude',
  'longitude',
  'brewery_count',
];

export const DIM_LOCATION_COLUMNS: (keyof DimLocation)[] = [
  'location_key',
  'city',
  'state',
  'country',
];

export const DIM_BREWERY_TYPE_COLUMNS: (keyof DimBreweryType)[] = [
  'type_key',
  'brewery_type',
];

/** Comma-delimited with a header row; null becomes an empty field */
export function toCsv<T extends object>(rows: readonly T[], columns: (keyof T & string)[]): string {
  return stringify([...rows], { header: true, columns });
}

/**
 * Gold Writer
 * Publishes the star schema as one CSV file per table, all or nothing
 */
@Injectable()
export class GoldWriterService {
  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly files: FileStorageService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(GoldWriterService.name);
  }

  pathFor(table: GoldTableName): string {
    return path.join(this.config.paths.goldDir, `${table}.csv`);
  }

  async write(gold: GoldTables): Promise<GoldArtifacts> {
    const tables: Array<{ name: GoldTableName; csv: string }> = [
      {
        name: 'fact_breweries',
        csv: toCsv(gold.factBreweries, FACT_BREWERIES_COLUMNS),
      },
      {
        name: 'dim_location',
        csv: toCsv(gold.dimLocation, DIM_LOCATION_COLUMNS),
      },
      {
        name: 'dim_brewery_type',
        csv: toCsv(gold.dimBreweryType, DIM_BREWERY_TYPE_COLUMNS),
      },
    ];

    await this.files.writeAtomic(
      'publish',
      tables.map((table) => this.pathFor(table.name)),
      async (staged) => {
        for (const [index, file] of staged.entries()) {
          await fsp.writeFile(file.temp, tables[index].csv, 'utf8');
        }
      },
    );

    const artifacts: GoldArtifacts = {
      fact_breweries: { path: this.pathFor('fact_breweries'), rows: gold.factBreweries.length },
      dim_location: { path: this.pathFor('dim_location'), rows: gold.dimLocation.length },
      dim_brewery_type: {
        path: this.pathFor('dim_brewery_type'),
        rows: gold.dimBreweryType.length,
      },
    };

    this.logger.log(`Gold tables exported to ${this.config.paths.goldDir}`);
    return artifacts;
  }
}
