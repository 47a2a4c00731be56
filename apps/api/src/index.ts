import { createServer } from "node:http";
import { createApp } from "./app.js";
import { LiveSchoolFinderService } from "./services/school-finder-service.js";
import { SchoolSqliteStore } from "./services/school-sqlite-store.js";
import { resolveDatabasePath } from "./utils/default-data-paths.js";
import { loadLocalEnv } from "./utils/load-local-env.js";
import { resolveSearchResultLimit } from "./utils/search-settings.js";

loadLocalEnv();

const MAX_PORT = 65_535;
let port = Number(process.env.PORT ?? "8787");
const strictPort = process.env.STRICT_PORT === "1";
const databasePath = resolveDatabasePath();
const store = await SchoolSqliteStore.open(databasePath);
const service = new LiveSchoolFinderService(store, {
  defaultLimit: resolveSearchResultLimit(),
  verbose: process.env.VERBOSE_LOGGING === "1"
});
const app = createApp(service);
const server = createServer(app);

if (!Number.isInteger(port) || port < 1 || port > MAX_PORT) {
  throw new Error(
    `PORT must be an integer between 1 and ${MAX_PORT}. Received "${process.env.PORT}".`
  );
}

if (store.countSchools() === 0) {
  // eslint-disable-next-line no-console
  console.warn(`No schools loaded in ${databasePath}; run "npm run load-data" first.`);
}

server.listen(port);

server.on("listening", () => {
  // eslint-disable-next-line no-console
  console.log(`API server listening on http://localhost:${port}`);
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.code !== "EADDRINUSE") {
    throw error;
  }

  if (strictPort) {
    throw new Error(`Port ${port} is in use and STRICT_PORT=1 is set.`);
  }

  if (port >= MAX_PORT) {
    throw new Error(`No available ports found after trying ${port}.`);
  }

  const nextPort = port + 1;
  // eslint-disable-next-line no-console
  console.warn(`Port ${port} is in use, retrying on ${nextPort}.`);
  port = nextPort;
  server.listen(port);
});

const shutdown = (): void => {
  server.close(() => {
    store.close();
    process.exit(0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
