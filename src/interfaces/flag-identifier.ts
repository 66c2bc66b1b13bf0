/**
 * Value identifying a permission flag.
 * - `number` - Any finite number, fractions truncate toward zero
 * - `bigint` - Arbitrary-precision integer
 * - `string` - Decimal literal, e.g. `'7'`, `'+3'` or `'-1.5'`
 *
 * Identifiers are reduced modulo the store's flag space, so they are not bit
 * indexes themselves.
 */
export type FlagIdentifier = number | bigint | string;
