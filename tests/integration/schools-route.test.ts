import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../../apps/api/src/app.js";
import { LiveSchoolFinderService } from "../../apps/api/src/services/school-finder-service.js";
import type {
  SchoolFinderService,
  SchoolSearchInput
} from "../../apps/api/src/types/domain.js";
import { InMemorySchoolDataSource, makeSchool } from "../test-utils.js";

const makeLiveApp = () =>
  createApp(
    new LiveSchoolFinderService(
      new InMemorySchoolDataSource(
        [
          makeSchool(1, {
            schoolName: "Harbour Public School",
            townSuburb: "Sydney",
            postcode: "2000",
            latitude: -33.8688,
            longitude: 151.2093,
            levelOfSchooling: "Primary School",
            preschoolInd: "Y",
            schoolGender: "Coed",
            latestYearEnrolmentFte: 250
          }),
          makeSchool(2, {
            schoolName: "Harbour High School",
            townSuburb: "Sydney",
            postcode: "2000",
            latitude: -33.8788,
            longitude: 151.2093,
            levelOfSchooling: "Secondary School",
            selectiveSchool: "Fully Selective"
          }),
          makeSchool(3, {
            schoolName: "Far Away School",
            latitude: -35.0,
            longitude: 149.0,
            levelOfSchooling: "Primary School"
          })
        ],
        [{ postcode: "2000", latitude: -33.8688, longitude: 151.2093, suburb: "Sydney" }]
      )
    )
  );

const makeStubService = (overrides: Partial<SchoolFinderService> = {}): SchoolFinderService => ({
  searchNearby: async () => ({ status: "LOCATION_NOT_FOUND" }),
  getSchool: async () => null,
  compareSchools: async () => ({ status: "FOUND", schools: [] }),
  listLevels: async () => [],
  ...overrides
});

describe("GET /api/health", () => {
  it("reports ok", async () => {
    const res = await request(createApp(makeStubService())).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });
});

describe("GET /api/schools/search", () => {
  it("returns nearby schools sorted by distance", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/search?postcode=2000&radius=5");

    expect(res.status).toBe(200);
    expect(res.body.location).toEqual({
      latitude: -33.8688,
      longitude: 151.2093,
      source: "POSTCODE_CENTROID"
    });
    expect(res.body.radiusKm).toBe(5);
    expect(res.body.resultCount).toBe(2);
    expect(
      res.body.schools.map((school: { id: number; distanceKm: number }) => [
        school.id,
        school.distanceKm
      ])
    ).toEqual([
      [1, 0],
      [2, 1.11]
    ]);
    expect(res.body.levels).toEqual(["Primary School", "Secondary School"]);
  });

  it("applies flag filters from the query string", async () => {
    const res = await request(makeLiveApp()).get(
      "/api/schools/search?suburb=sydney&radius=500&notSelective=Y&level=Primary%20School"
    );

    expect(res.status).toBe(200);
    expect(res.body.schools.map((school: { id: number }) => school.id)).toEqual([1, 3]);
  });

  it("passes parsed input to the service", async () => {
    let seenInput: SchoolSearchInput | undefined;
    const app = createApp(
      makeStubService({
        searchNearby: async (input) => {
          seenInput = input;
          return { status: "LOCATION_NOT_FOUND" };
        }
      })
    );

    await request(app).get(
      "/api/schools/search?suburb=Ryde&hasPreschool=Y&hasIntensiveEnglish=true&hasOpportunityClass=N&limit=10"
    );

    expect(seenInput).toEqual({
      suburb: "Ryde",
      postcode: undefined,
      radiusKm: 5,
      limit: 10,
      filters: {
        level: null,
        hasPreschool: true,
        hasIntensiveEnglish: true,
        hasOpportunityClass: false,
        notSelective: false,
        hasDistanceEducation: false
      }
    });
  });

  it("rejects a search without a location", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/search?suburb=%20&radius=5");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Please enter a suburb or postcode.");
  });

  it("applies the default radius and limit to empty parameters", async () => {
    let seenInput: SchoolSearchInput | undefined;
    const app = createApp(
      makeStubService({
        searchNearby: async (input) => {
          seenInput = input;
          return { status: "LOCATION_NOT_FOUND" };
        }
      })
    );

    await request(app).get("/api/schools/search?postcode=2000&radius=&limit=");

    expect(seenInput).toMatchObject({ postcode: "2000", radiusKm: 5, limit: undefined });

    const res = await request(makeLiveApp()).get("/api/schools/search?postcode=2000&radius=");
    expect(res.status).toBe(200);
    expect(res.body.radiusKm).toBe(5);
    expect(res.body.resultCount).toBe(2);
  });

  it("rejects an unparsable radius", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/search?postcode=2000&radius=far");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid query parameters");
  });

  it("returns 404 when the location cannot be resolved", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/search?suburb=Atlantis&postcode=0001");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Could not find location for Atlantis 0001. Please try again.");
  });

  it("returns 500 when the service errors", async () => {
    const app = createApp(
      makeStubService({
        searchNearby: async () => {
          throw new Error("database locked");
        }
      })
    );

    const res = await request(app).get("/api/schools/search?postcode=2000");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: "Unable to search schools",
      message: "database locked"
    });
  });
});

describe("GET /api/schools/levels", () => {
  it("lists distinct levels", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/levels");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ levels: ["Primary School", "Secondary School"] });
  });
});

describe("GET /api/schools/compare", () => {
  it("returns display views in the requested order with distances", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=2,1&distances=1.11,0");

    expect(res.status).toBe(200);
    expect(
      res.body.schools.map((school: { id: number; distanceKm: number | null }) => [
        school.id,
        school.distanceKm
      ])
    ).toEqual([
      [2, 1.11],
      [1, 0]
    ]);
    expect(res.body.schools[1]).toMatchObject({
      gender: "Boys & Girls",
      schoolSize: "Small School"
    });
  });

  it("uses at most three schools", async () => {
    let seenIds: number[] = [];
    const app = createApp(
      makeStubService({
        compareSchools: async (ids) => {
          seenIds = ids;
          return { status: "FOUND", schools: [] };
        }
      })
    );

    await request(app).get("/api/schools/compare?ids=1,2,3,4");

    expect(seenIds).toEqual([1, 2, 3, 4]);

    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=1,2,3,4");
    expect(res.status).toBe(200);
    expect(res.body.schools.map((school: { id: number }) => school.id)).toEqual([1, 2, 3]);
  });

  it("rejects malformed distances", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=1&distances=near");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid distances" });
  });

  it("leaves distances empty when none are given", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=1&distances=");

    expect(res.status).toBe(200);
    expect(res.body.schools[0].distanceKm).toBeNull();
  });

  it("returns one entry per requested id, repeats included", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=1,1&distances=0,0");

    expect(res.status).toBe(200);
    expect(res.body.schools.map((school: { id: number }) => school.id)).toEqual([1, 1]);
  });

  it("rejects missing and malformed ids", async () => {
    const app = makeLiveApp();

    const missing = await request(app).get("/api/schools/compare");
    expect(missing.status).toBe(400);
    expect(missing.body.error).toBe("Please select schools to compare.");

    const malformed = await request(app).get("/api/schools/compare?ids=1,abc");
    expect(malformed.status).toBe(400);
    expect(malformed.body.error).toBe("Invalid school IDs");

    const empty = await request(app).get("/api/schools/compare?ids=,%20,");
    expect(empty.status).toBe(400);
    expect(empty.body.error).toBe("No valid school IDs provided");
  });

  it("returns 404 when a school is missing", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/compare?ids=1,99");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "One or more schools not found", missingIds: [99] });
  });
});

describe("GET /api/schools/:id", () => {
  it("returns the school record", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/2");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ id: 2, schoolName: "Harbour High School" });
  });

  it("returns 404 for an unknown school", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/404");

    expect(res.status).toBe(404);
    expect(res.body.error).toBe("School not found");
  });

  it("rejects a non-numeric id", async () => {
    const res = await request(makeLiveApp()).get("/api/schools/abc");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid school ID");
  });
});
