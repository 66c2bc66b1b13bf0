/**
 * Emulated machine integer width, in bits.
 */
export type IntegerWidth = 32 | 64;

/**
 * Configuration for permission stores, as read from the rc file.
 */
export interface PermissionStoreConfig {
  /** Number of addressable flag slots (number or numeric string) */
  flagSpace: number | string;
  /** Mask width in bits, bounding `flagSpace` and the highest settable bit */
  integerWidth: IntegerWidth;
}
