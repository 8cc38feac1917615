import { ValueTransformer } from 'typeorm';

/**
 * Normalizes `decimal(12,2)` columns to a two-decimal string on read.
 * Postgres hands numerics back as strings, SQLite as numbers.
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: string | number | null | undefined) => value,
  from: (value: string | number | null) => {
    if (value === null || value === undefined) return value;
    return Number(value).toFixed(2);
  },
};
