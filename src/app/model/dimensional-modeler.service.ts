import { Injectable } from '@nestjs/common';
import { TransformError } from '../../common/errors/pipeline.errors';
import { LoggerService } from '../../common/services/logger.service';
import {
  DimBreweryType,
  DimLocation,
  FactBrewery,
  GoldTables,
  SilverBrewery,
  SilverTable,
} from '../interfaces/brewery.interface';
import { compareText } from '../transform/cleansing.service';

/** Surrogate key reserved for rows whose natural key cannot be formed */
export const UNKNOWN_KEY = 0;
export const UNKNOWN_BREWERY_TYPE = 'unknown';

type LocationKey = Omit<DimLocation, 'location_key'>;

// Only real locations reach the dimension; city or state must be known
function locationOf(row: SilverBrewery): LocationKey | null {
  if (row.city === null && row.state === null) {
    return null;
  }
  return { city: row.city, state: row.state, country: row.country };
}

function naturalKey(location: LocationKey): string {
  return JSON.stringify([location.city, location.state, location.country]);
}

function compareNullable(a: string | null, b: string | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  return compareText(a, b);
}

function compareLocations(a: LocationKey, b: LocationKey): number {
  return (
    compareNullable(a.state, b.state) ||
    compareNullable(a.city, b.city) ||
    compareNullable(a.country, b.country)
  );
}

export const UNKNOWN_LOCATION: DimLocation = {
  location_key: UNKNOWN_KEY,
  city: null,
  state: null,
  country: null,
};

export const UNKNOWN_TYPE: DimBreweryType = {
  type_key: UNKNOWN_KEY,
  brewery_type: UNKNOWN_BREWERY_TYPE,
};

export function buildLocationDimension(rows: readonly SilverBrewery[]): {
  dimension: DimLocation[];
  keyOf: (row: SilverBrewery) => number;
} {
  const distinct = new Map<string, LocationKey>();
  for (const row of rows) {
    const location = locationOf(row);
    if (location) {
      distinct.set(naturalKey(location), location);
    }
  }

  const ranked = [...distinct.values()].sort(compareLocations);
  const keys = new Map<string, number>(
    ranked.map((location, index) => [naturalKey(location), index + 1]),
  );

  return {
    dimension: [
      UNKNOWN_LOCATION,
      ...ranked.map((location, index) => ({ location_key: index + 1, ...location })),
    ],
    keyOf: (row) => {
      const location = locationOf(row);
      return location ? keys.get(naturalKey(location)) ?? UNKNOWN_KEY : UNKNOWN_KEY;
    },
  };
}

export function buildTypeDimension(rows: readonly SilverBrewery[]): {
  dimension: DimBreweryType[];
  keyOf: (row: SilverBrewery) => number;
} {
  const distinct = new Set<string>();
  for (const { brewery_type } of rows) {
    if (brewery_type !== null && brewery_type !== UNKNOWN_BREWERY_TYPE) {
      distinct.add(brewery_type);
    }
  }

  const ranked = [...distinct].sort(compareText);
  const keys = new Map<string, number>(ranked.map((type, index) => [type, index + 1]));

  return {
    dimension: [
      UNKNOWN_TYPE,
      ...ranked.map((brewery_type, index) => ({ type_key: index + 1, brewery_type })),
    ],
    keyOf: (row) =>
      row.brewery_type === null ? UNKNOWN_KEY : keys.get(row.brewery_type) ?? UNKNOWN_KEY,
  };
}

/**
 * Check that every fact key resolves to exactly one dimension row and that
 * no dimension repeats a key. A violation is a modeling bug.
 */
export function assertReferentialIntegrity(gold: GoldTables): void {
  const count = (keys: number[]) => {
    const counts = new Map<number, number>();
    for (const key of keys) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return counts;
  };
  const locations = count(gold.dimLocation.map((d) => d.location_key));
  const types = count(gold.dimBreweryType.map((d) => d.type_key));

  for (const fact of gold.factBreweries) {
    if (locations.get(fact.location_key) !== 1) {
      throw new TransformError(
        'model',
        `Fact ${fact.brewery_id} has location_key ${fact.location_key} with no single dim_location row`,
      );
    }
    if (types.get(fact.type_key) !== 1) {
      throw new TransformError(
        'model',
        `Fact ${fact.brewery_id} has type_key ${fact.type_key} with no single dim_brewery_type row`,
      );
    }
  }
}

/**
 * Dimensional Modeler
 * Derives the star schema (one fact, two dimensions) from the silver table
 *
 * Keys are dense ranks over sorted natural keys, so they are stable within a
 * run and repeat across runs over the same data.
 */
@Injectable()
export class DimensionalModelerService {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext(DimensionalModelerService.name);
  }

  model(silver: SilverTable): GoldTables {
    const rows = [...silver.rows].sort((a, b) => compareText(a.brewery_id, b.brewery_id));
    const location = buildLocationDimension(rows);
    const type = buildTypeDimension(rows);

    const factBreweries: FactBrewery[] = rows.map((row) => ({
      brewery_id: row.brewery_id,
      name: row.name,
      location_key: location.keyOf(row),
      type_key: type.keyOf(row),
      latitude: row.latitude,
      longitude: row.longitude,
      brewery_count: 1,
    }));

    const gold: GoldTables = {
      factBreweries,
      dimLocation: location.dimension,
      dimBreweryType: type.dimension,
    };
    assertReferentialIntegrity(gold);

    const unknownLocations = factBreweries.filter(
      (fact) => fact.location_key === UNKNOWN_KEY,
    ).length;
    if (unknownLocations > 0) {
      this.logger.warn(`${unknownLocations} breweries mapped to the unknown location`);
    }
    this.logger.log(
      `Modeled ${factBreweries.length} facts, ${location.dimension.length} locations, ${type.dimension.length} brewery types`,
    );

    return gold;
  }
}
