/**
 * Fields the Open Brewery DB returns for a brewery.
 * Raw record values stay `unknown` until the cleansing stage casts them.
 */
export const BREWERY_FIELDS = [
  'id',
  'name',
  'brewery_type',
  'address_1',
  'address_2',
  'address_3',
  'street',
  'city',
  'state_province',
  'state',
  'postal_code',
  'country',
  'longitude',
  'latitude',
  'phone',
  'website_url',
] as const;

export type BreweryField = (typeof BREWERY_FIELDS)[number];

export type BreweryRecord = Readonly<Record<string, unknown>>;

export interface RawPage {
  /** 1-based page index as requested from the source */
  page: number;
  records: BreweryRecord[];
}

/** One landed row: every known field as text, plus its fetch position */
export type BronzeRow = { [K in BreweryField]: string | null } & {
  page: number;
  position: number;
  raw_json: string;
};

export interface BronzeSnapshot {
  path: string;
  pageCount: number;
  recordCount: number;
}

export interface SilverBrewery {
  brewery_id: string;
  name: string;
  brewery_type: string | null;
  address: string;
  city: string | null;
  state: string | null;
  postal_code: string | null;
  country: string | null;
  longitude: number | null;
  latitude: number | null;
  phone: string | null;
  website_url: string | null;
}

export interface SilverStats {
  inputRows: number;
  droppedInvalid: number;
  droppedByCountry: number;
  duplicatesRemoved: number;
  coordinatesNulled: number;
  outputRows: number;
}

export interface SilverTable {
  path: string;
  rows: SilverBrewery[];
  stats: SilverStats;
}

export interface FactBrewery {
  brewery_id: string;
  name: string;
  location_key: number;
  type_key: number;
  latitude: number | null;
  longitude: number | null;
  brewery_count: number;
}

export interface DimLocation {
  location_key: number;
  city: string | null;
  state: string | null;
  country: string | null;
}

export interface DimBreweryType {
  type_key: number;
  brewery_type: string;
}

export interface GoldTables {
  factBreweries: FactBrewery[];
  dimLocation: DimLocation[];
  dimBreweryType: DimBreweryType[];
}

export type GoldTableName = 'fact_breweries' | 'dim_location' | 'dim_brewery_type';

export type GoldArtifacts = Record<GoldTableName, { path: string; rows: number }>;
