import { existsSync } from "node:fs";
import { join } from "node:path";

const MOUNTED_VOLUME_DIR = "/data";
const LOCAL_DATA_DIR = "data";

export const DEFAULT_SCHOOLS_CSV_PATH = join(LOCAL_DATA_DIR, "master_dataset.csv");

export const DEFAULT_POSTCODES_CSV_PATH = join(LOCAL_DATA_DIR, "postcodes_nsw.csv");

/** A mounted `/data` volume holds the database in deployed environments. */
export const resolveDefaultDatabasePath = (
  volumeExists: (path: string) => boolean = existsSync
): string =>
  volumeExists(MOUNTED_VOLUME_DIR)
    ? join(MOUNTED_VOLUME_DIR, "school_finder.db")
    : join(LOCAL_DATA_DIR, "school_finder.db");

export const resolveDatabasePath = (env: NodeJS.ProcessEnv = process.env): string =>
  env.SCHOOL_DB_PATH?.trim() || resolveDefaultDatabasePath();
