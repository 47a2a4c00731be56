import { loadData } from "../services/school-data-loader.js";
import {
  DEFAULT_POSTCODES_CSV_PATH,
  DEFAULT_SCHOOLS_CSV_PATH,
  resolveDatabasePath
} from "../utils/default-data-paths.js";
import { loadLocalEnv } from "../utils/load-local-env.js";

const run = async () => {
  loadLocalEnv();

  const summary = await loadData({
    databasePath: resolveDatabasePath(),
    schoolsCsvPath: process.env.SCHOOLS_CSV_PATH ?? DEFAULT_SCHOOLS_CSV_PATH,
    postcodesCsvPath: process.env.POSTCODES_CSV_PATH ?? DEFAULT_POSTCODES_CSV_PATH,
    // eslint-disable-next-line no-console
    log: (message) => console.log(message)
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(summary, null, 2));
};

run().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      null,
      2
    )
  );
  process.exit(1);
});
