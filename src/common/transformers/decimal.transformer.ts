import Decimal from 'decimal.js';
import { ValueTransformer } from 'typeorm';

/**
 * Maps a `decimal(precision, scale)` column to a JS number. Postgres returns
 * decimals as strings; SQLite already returns numbers.
 */
export function decimalTransformer(precision: number, scale: number): ValueTransformer {
  const limit = new Decimal(10).pow(precision - scale);

  return {
    to(value: number | null | undefined): string | null {
      if (value === null || value === undefined) {
        return null;
      }
      if (!Number.isFinite(value)) {
        throw new Error(`Invalid decimal value: ${String(value)}`);
      }

      const rounded = new Decimal(value).toDecimalPlaces(scale, Decimal.ROUND_HALF_UP);
      if (rounded.abs().gte(limit)) {
        throw new Error(`Decimal value ${value} does not fit decimal(${precision},${scale})`);
      }
      return rounded.toFixed(scale);
    },

    from(value: string | number | null | undefined): number | null {
      if (value === null || value === undefined) {
        return null;
      }
      return new Decimal(value).toNumber();
    },
  };
}

/** Purchase costs and invoice totals: `decimal(12,2)`. */
export const MoneyTransformer = decimalTransformer(12, 2);
