import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "dotenv";

/**
 * Applies `.env` then `.env.local` from `cwd`. Values already in the
 * environment win over `.env`; `.env.local` overrides both. Returns the files
 * that were read.
 */
export const loadLocalEnv = (
  cwd = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string[] => {
  const loadedFiles: string[] = [];

  for (const [filename, override] of [
    [".env", false],
    [".env.local", true]
  ] as const) {
    const path = resolve(cwd, filename);
    if (!existsSync(path)) {
      continue;
    }

    for (const [key, value] of Object.entries(parse(readFileSync(path)))) {
      if (override || env[key] === undefined) {
        env[key] = value;
      }
    }

    loadedFiles.push(path);
  }

  return loadedFiles;
};
