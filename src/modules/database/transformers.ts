/**
 * Shared TypeORM transformers for common data type conversions.
 */

import {ValueTransformer} from "typeorm";
import {formatAmount, toAmount} from "../lib/util";

/**
 * Currency transformer for nullable decimal columns.
 * Numbers are stored as 2-decimal strings and read back as numbers; null stays null.
 */
export const currencyTransformer: ValueTransformer = {
    to: (value: number | string | null | undefined) =>
        value === null || value === undefined ? null : formatAmount(toAmount(value)),
    from: (value: string | number | null) => (value === null ? null : Number(value)),
};
