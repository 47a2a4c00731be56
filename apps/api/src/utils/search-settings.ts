import { z } from "zod";
import { DEFAULT_SEARCH_LIMIT } from "../services/school-search.js";

const searchResultLimitSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform((value) => Number.parseInt(value, 10));

/** `SEARCH_RESULT_LIMIT` as a non-negative integer; anything else falls back to the default. */
export const resolveSearchResultLimit = (env: NodeJS.ProcessEnv = process.env): number => {
  const parseResult = searchResultLimitSchema.safeParse(env.SEARCH_RESULT_LIMIT);
  return parseResult.success ? parseResult.data : DEFAULT_SEARCH_LIMIT;
};
