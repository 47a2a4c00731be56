import { existsSync } from "node:fs";
import { readPostcodesCsv, readSchoolsCsv } from "./school-csv-loader.js";
import { SchoolSqliteStore } from "./school-sqlite-store.js";

export interface LoadDataOptions {
  databasePath: string;
  schoolsCsvPath: string;
  postcodesCsvPath: string;
  log?: (message: string) => void;
}

export interface LoadDataSummary {
  databasePath: string;
  schoolsLoaded: number;
  postcodesLoaded: number;
  postcodeRowsSkipped: number;
  warnings: string[];
}

/** Replaces the contents of the database with the rows of both CSV files. */
export const loadData = async (options: LoadDataOptions): Promise<LoadDataSummary> => {
  const log = options.log ?? (() => {});
  const warnings: string[] = [];
  const store = await SchoolSqliteStore.open(options.databasePath);

  try {
    store.clear();

    let schoolsLoaded = 0;
    if (existsSync(options.schoolsCsvPath)) {
      log(`Loading schools from ${options.schoolsCsvPath}...`);
      schoolsLoaded = store.insertSchools(await readSchoolsCsv(options.schoolsCsvPath));
      log(`Loaded ${schoolsLoaded} schools`);
    } else {
      warnings.push(`${options.schoolsCsvPath} not found`);
    }

    let postcodesLoaded = 0;
    let postcodeRowsSkipped = 0;
    if (existsSync(options.postcodesCsvPath)) {
      log(`Loading postcodes from ${options.postcodesCsvPath}...`);
      const { postcodes, skippedRows } = await readPostcodesCsv(options.postcodesCsvPath);
      postcodesLoaded = store.upsertPostcodes(postcodes);
      postcodeRowsSkipped = skippedRows;
      log(`Loaded ${postcodesLoaded} postcodes`);
    } else {
      warnings.push(
        `${options.postcodesCsvPath} not found (suburbs resolve from school coordinates only)`
      );
    }

    store.save();

    return {
      databasePath: options.databasePath,
      schoolsLoaded,
      postcodesLoaded,
      postcodeRowsSkipped,
      warnings
    };
  } finally {
    store.close();
  }
};
