import path from 'path';
import os from 'os';

export const DATA_DIR_NAME = 'workbalance-data';

/** Folder holding entries.csv, placed under `basePath` or the user's home directory. */
export function getDataDirectory(basePath?: string): string {
  return path.join(basePath || os.homedir(), DATA_DIR_NAME);
}
