import type { Gibbon } from '@icazemier/gibbons';

/**
 * Union type representing the accepted formats for restoring a mask.
 * - `bigint` - A raw mask, bit `n` being flag index `n`
 * - `Gibbon` - A Gibbon where position `n + 1` holds flag index `n`
 * - `Buffer` - An encoded Gibbon
 */
export type MaskLike = bigint | Gibbon | Buffer;
