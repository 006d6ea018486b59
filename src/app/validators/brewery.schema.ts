import { z } from 'zod';
import { BronzeRow } from '../interfaces/brewery.interface';

/**
 * Zod schemas guarding the two places untyped data enters the pipeline:
 * the API response body and rows read back from the bronze Parquet file.
 */

// A page body is a JSON array of objects; field values are checked later
export const BreweryPageSchema = z.array(z.record(z.string(), z.unknown()));

// Parquet omits null optional columns, so absent and null are the same thing
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const BronzeRowSchema = z.object({
  id: text,
  name: text,
  brewery_type: text,
  address_1: text,
  address_2: text,
  address_3: text,
  street: text,
  city: text,
  state_province: text,
  state: text,
  postal_code: text,
  country: text,
  longitude: text,
  latitude: text,
  phone: text,
  website_url: text,
  page: z.number().int().positive(),
  position: z.number().int().nonnegative(),
  raw_json: z.string(),
});

export function parseBronzeRow(value: unknown): BronzeRow {
  return BronzeRowSchema.parse(value);
}
