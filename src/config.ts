import { cosmiconfig } from 'cosmiconfig';
import type {
  IntegerWidth,
  PermissionStoreConfig,
} from './interfaces/index.js';
import { Utils } from './utils.js';

export const DEFAULT_CONFIG: PermissionStoreConfig = {
  flagSpace: 10,
  integerWidth: 64,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isIntegerWidth = (value: unknown): value is IntegerWidth =>
  value === 32 || value === 64;

export class ConfigLoader {
  /**
   * Searches the working directory for the module's rc file, or loads
   * `configFile` when given, and fills in missing fields with defaults.
   *
   * @param module - Name used to look up `.<module>rc`, `.<module>rc.json`...
   * @param configFile - Explicit path to a config file
   * @returns The resolved config, or `null` when none was found
   * @throws TypeError when a field holds an unexpected value
   */
  static async search(
    module = 'permission-store',
    configFile?: string
  ): Promise<PermissionStoreConfig | null> {
    const explorer = cosmiconfig(module);

    const search = configFile
      ? await explorer.load(configFile)
      : await explorer.search();
    if (!search?.config) {
      return null;
    }
    return ConfigLoader.resolve(search.config);
  }

  /**
   * Same as `search`, but a missing config is an error.
   *
   * @throws Error when no config was found
   */
  static async load(
    module = 'permission-store',
    configFile?: string
  ): Promise<PermissionStoreConfig> {
    const config = await ConfigLoader.search(module, configFile);
    if (!config) {
      throw new Error(
        'Could not load config, execute `npx permission-store init`'
      );
    }
    return config;
  }

  static resolve(config: unknown): PermissionStoreConfig {
    if (!isRecord(config)) {
      throw new TypeError('Config must be an object');
    }
    const {
      flagSpace = DEFAULT_CONFIG.flagSpace,
      integerWidth = DEFAULT_CONFIG.integerWidth,
    } = config;

    if (!Utils.isNumericLike(flagSpace)) {
      throw new TypeError('`flagSpace` must be a number or numeric string');
    }
    if (!isIntegerWidth(integerWidth)) {
      throw new TypeError('`integerWidth` must be 32 or 64');
    }
    return { flagSpace, integerWidth };
  }
}
