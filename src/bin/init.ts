import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_CONFIG } from '../config.js';

export const RC_FILE_NAME = '.permission-storerc.json';

/**
 * Command arguments for the init command.
 */
export interface InitCommandArgs {
  /** Directory to write the rc file into */
  directory: string;
  /** Overwrite an existing rc file */
  force?: boolean;
}

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'EEXIST';

/**
 * Writes an rc file holding the default store configuration.
 *
 * @param argv - Target directory and overwrite flag
 * @returns Path of the written file
 * @throws Error when the file exists and `force` is not set
 */
export const init = async (argv: InitCommandArgs): Promise<string> => {
  const { directory, force = false } = argv;
  const path = join(directory, RC_FILE_NAME);

  try {
    await writeFile(path, `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`, {
      flag: force ? 'w' : 'wx',
    });
  } catch (error) {
    if (isAlreadyExists(error)) {
      throw new Error(`${path} already exists, use --force to overwrite`);
    }
    throw error;
  }
  return path;
};
