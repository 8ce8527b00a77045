import { Decimal } from 'decimal.js';
import { ValueTransformer } from 'typeorm';

/**
 * Maps Postgres numeric columns to Decimal values.
 *
 * The pg driver hands numeric values back as strings; parsing them into
 * numbers would reintroduce binary rounding into stored scores.
 */
export const decimalTransformer: ValueTransformer = {
    to(value: Decimal | null | undefined): string | null | undefined {
        if (value === null || value === undefined) {
            return value;
        }
        return value.toString();
    },
    from(value: string | null): Decimal | null {
        return value === null ? null : new Decimal(value);
    }
};
