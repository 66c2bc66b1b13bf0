import { ConfigLoader, DEFAULT_CONFIG } from '../config.js';
import type { FlagIdentifier, IntegerWidth } from '../interfaces/index.js';
import { PermissionStore } from '../models/index.js';

/**
 * Command arguments for the mask command.
 */
export interface MaskCommandArgs {
  flags: Array<FlagIdentifier>;
  flagSpace?: number | string;
  integerWidth?: IntegerWidth;
  /** Optional path to custom configuration file */
  config?: string;
}

/**
 * Renders a store's mask as decimal, as binary padded to the addressable
 * width, and as the list of set indexes.
 *
 * @example
 * ```typescript
 * describeMask(new PermissionStore().setPermissions([1, 7]));
 * // [
 * //   'mask: 130',
 * //   'binary: 0010000010',
 * //   'indexes: 1, 7',
 * // ]
 * ```
 */
export const describeMask = (store: PermissionStore): Array<string> => {
  const space = store.getPermissions();
  const width = BigInt(store.integerWidth);
  const digits = Number(space < width ? space : width);
  const indexes = store.getActiveIndexes();

  return [
    `mask: ${store.bitMask}`,
    `binary: ${store.bitMask.toString(2).padStart(digits, '0')}`,
    `indexes: ${indexes.length ? indexes.join(', ') : '-'}`,
  ];
};

/**
 * Computes the mask the given flags produce. Command line options take
 * precedence over the config file.
 */
export const mask = async (argv: MaskCommandArgs): Promise<Array<string>> => {
  const config =
    (await ConfigLoader.search('permission-store', argv.config)) ??
    DEFAULT_CONFIG;
  const store = PermissionStore.fromConfig({
    flagSpace: argv.flagSpace ?? config.flagSpace,
    integerWidth: argv.integerWidth ?? config.integerWidth,
  });
  return describeMask(store.setPermissions(argv.flags));
};
