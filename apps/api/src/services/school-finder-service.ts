import { DEFAULT_SEARCH_LIMIT, ProximitySchoolSearch } from "./school-search.js";
import { SchoolLocationResolver } from "./location-resolver.js";
import { transformSchoolsForComparison } from "./school-display.js";
import type {
  LocationResolver,
  SchoolComparisonOutcome,
  SchoolDataSource,
  SchoolFinderService,
  SchoolRecord,
  SchoolSearchEngine,
  SchoolSearchInput,
  SchoolSearchOutcome
} from "../types/domain.js";

export const MAX_COMPARED_SCHOOLS = 3;

interface LiveSchoolFinderServiceOptions {
  resolver?: LocationResolver;
  searchEngine?: SchoolSearchEngine;
  defaultLimit?: number;
  verbose?: boolean;
}

export class LiveSchoolFinderService implements SchoolFinderService {
  private readonly dataSource: SchoolDataSource;

  private readonly resolver: LocationResolver;

  private readonly searchEngine: SchoolSearchEngine;

  private readonly defaultLimit: number;

  private readonly log: (message: string) => void;

  constructor(dataSource: SchoolDataSource, options?: LiveSchoolFinderServiceOptions) {
    this.dataSource = dataSource;
    this.resolver = options?.resolver ??
      new SchoolLocationResolver(dataSource, { verbose: options?.verbose });
    this.searchEngine = options?.searchEngine ?? new ProximitySchoolSearch(dataSource);
    this.defaultLimit = options?.defaultLimit ?? DEFAULT_SEARCH_LIMIT;
    this.log = options?.verbose ? (message) => console.log(`  ${message}`) : () => {};
  }

  async searchNearby(input: SchoolSearchInput): Promise<SchoolSearchOutcome> {
    const suburb = input.suburb?.trim() || null;
    const postcode = input.postcode?.trim() || null;

    if (suburb === null && postcode === null) {
      return { status: "MISSING_LOCATION" };
    }

    const location = await this.resolver.resolve(suburb, postcode);
    if (!location) {
      return { status: "LOCATION_NOT_FOUND" };
    }

    const filters = input.filters ?? {};
    const [schools, levels] = await Promise.all([
      this.searchEngine.search(
        { latitude: location.latitude, longitude: location.longitude },
        input.radiusKm,
        filters,
        input.limit ?? this.defaultLimit
      ),
      this.dataSource.getDistinctLevels()
    ]);

    this.log(
      `[searchNearby] ${schools.length} schools within ${input.radiusKm} km of ${location.latitude}, ${location.longitude} (${location.source})`
    );

    return {
      status: "FOUND",
      location,
      radiusKm: input.radiusKm,
      filters,
      schools,
      levels
    };
  }

  async getSchool(id: number): Promise<SchoolRecord | null> {
    return this.dataSource.getSchoolById(id);
  }

  /** Schools come back in the order their ids were given. */
  async compareSchools(ids: number[], distancesKm: number[]): Promise<SchoolComparisonOutcome> {
    const requestedIds = ids.slice(0, MAX_COMPARED_SCHOOLS);
    const schools = await this.dataSource.getSchoolsByIds(requestedIds);
    const schoolsById = new Map(schools.map((school) => [school.id, school]));

    const missingIds = requestedIds.filter((id) => !schoolsById.has(id));
    if (missingIds.length) {
      return { status: "SCHOOLS_NOT_FOUND", missingIds };
    }

    const orderedSchools = requestedIds.flatMap((id) => {
      const school = schoolsById.get(id);
      return school ? [school] : [];
    });

    return {
      status: "FOUND",
      schools: transformSchoolsForComparison(
        orderedSchools,
        distancesKm.slice(0, MAX_COMPARED_SCHOOLS)
      )
    };
  }

  async listLevels(): Promise<string[]> {
    return this.dataSource.getDistinctLevels();
  }
}
