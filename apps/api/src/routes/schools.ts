import { Router, type Response } from "express";
import { z } from "zod";
import type { SchoolFinderService, SchoolSearchFilters } from "../types/domain.js";

const DEFAULT_RADIUS_KM = 5;
const MAX_RESULT_LIMIT = 500;

const flagSchema = z
  .string()
  .optional()
  .transform((value) => value === "Y" || value === "1" || value === "true");

// An empty `radius=` or `limit=` means the parameter was left out, not zero.
const blankAsMissing = (value: unknown): unknown =>
  typeof value === "string" && !value.trim() ? undefined : value;

const searchQuerySchema = z.object({
  suburb: z.string().optional(),
  postcode: z.string().optional(),
  radius: z.preprocess(
    blankAsMissing,
    z.coerce.number().finite().nonnegative().default(DEFAULT_RADIUS_KM)
  ),
  level: z.string().trim().optional(),
  limit: z.preprocess(
    blankAsMissing,
    z.coerce.number().int().min(0).max(MAX_RESULT_LIMIT).optional()
  ),
  hasPreschool: flagSchema,
  hasIntensiveEnglish: flagSchema,
  hasOpportunityClass: flagSchema,
  notSelective: flagSchema,
  hasDistanceEducation: flagSchema
});

const compareQuerySchema = z.object({
  ids: z.string().optional(),
  distances: z.string().optional()
});

const schoolParamsSchema = z.object({
  id: z.coerce.number().int().positive()
});

const schoolIdListSchema = z.array(
  z
    .string()
    .regex(/^[+-]?\d+$/)
    .transform((value) => Number.parseInt(value, 10))
);

const distanceListSchema = z.array(z.coerce.number().finite());

const splitList = (raw: string): string[] =>
  raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const sendServerError = (res: Response, error: unknown, description: string) =>
  res.status(500).json({
    error: description,
    message: error instanceof Error ? error.message : "Unknown error"
  });

export const createSchoolsRouter = (service: SchoolFinderService): Router => {
  const router = Router();

  router.get("/levels", async (_, res) => {
    try {
      return res.json({ levels: await service.listLevels() });
    } catch (error) {
      return sendServerError(res, error, "Unable to load school levels");
    }
  });

  router.get("/search", async (req, res) => {
    const parseResult = searchQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return res.status(400).json({
        error: "Invalid query parameters",
        details: parseResult.error.flatten()
      });
    }

    const { suburb, postcode, radius, level, limit, ...flags } = parseResult.data;
    const filters: SchoolSearchFilters = {
      level: level || null,
      ...flags
    };

    try {
      const outcome = await service.searchNearby({
        suburb,
        postcode,
        radiusKm: radius,
        filters,
        limit
      });

      if (outcome.status === "MISSING_LOCATION") {
        return res.status(400).json({
          error: "Please enter a suburb or postcode."
        });
      }

      if (outcome.status === "LOCATION_NOT_FOUND") {
        return res.status(404).json({
          error: `Could not find location for ${suburb ?? ""} ${postcode ?? ""}. Please try again.`,
          suburb: suburb ?? null,
          postcode: postcode ?? null
        });
      }

      return res.json({
        location: outcome.location,
        radiusKm: outcome.radiusKm,
        filters: outcome.filters,
        resultCount: outcome.schools.length,
        schools: outcome.schools,
        levels: outcome.levels
      });
    } catch (error) {
      return sendServerError(res, error, "Unable to search schools");
    }
  });

  router.get("/compare", async (req, res) => {
    const parseResult = compareQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      return res.status(400).json({
        error: "Invalid query parameters",
        details: parseResult.error.flatten()
      });
    }

    const { ids, distances } = parseResult.data;
    if (!ids) {
      return res.status(400).json({ error: "Please select schools to compare." });
    }

    const idsResult = schoolIdListSchema.safeParse(splitList(ids));
    if (!idsResult.success) {
      return res.status(400).json({ error: "Invalid school IDs" });
    }

    if (!idsResult.data.length) {
      return res.status(400).json({ error: "No valid school IDs provided" });
    }

    const distancesResult = distanceListSchema.safeParse(distances ? splitList(distances) : []);
    if (!distancesResult.success) {
      return res.status(400).json({ error: "Invalid distances" });
    }

    try {
      const outcome = await service.compareSchools(idsResult.data, distancesResult.data);
      if (outcome.status === "SCHOOLS_NOT_FOUND") {
        return res.status(404).json({
          error: "One or more schools not found",
          missingIds: outcome.missingIds
        });
      }

      return res.json({ schools: outcome.schools });
    } catch (error) {
      return sendServerError(res, error, "Unable to compare schools");
    }
  });

  router.get("/:id", async (req, res) => {
    const parseResult = schoolParamsSchema.safeParse(req.params);
    if (!parseResult.success) {
      return res.status(400).json({
        error: "Invalid school ID",
        details: parseResult.error.flatten()
      });
    }

    try {
      const school = await service.getSchool(parseResult.data.id);
      if (!school) {
        return res.status(404).json({ error: "School not found" });
      }

      return res.json(school);
    } catch (error) {
      return sendServerError(res, error, "Unable to load school");
    }
  });

  return router;
};
