import type {
  Coordinates,
  PostcodeCentroid,
  ResolvedLocation,
  SchoolDisplay,
  SchoolRecord,
  SchoolSearchFilters,
  SchoolSearchResult
} from "../../../../packages/shared/src/contracts.js";

export type {
  Coordinates,
  LocationSource,
  NewSchoolRecord,
  PostcodeCentroid,
  ResolvedLocation,
  SchoolDisplay,
  SchoolRecord,
  SchoolSearchFilters,
  SchoolSearchResult
} from "../../../../packages/shared/src/contracts.js";

/**
 * Read-only access to the loaded reference data. Lookups that find nothing
 * resolve to `null` or an empty array.
 */
export interface SchoolDataSource {
  getPostcodeCentroid(postcode: string): Promise<PostcodeCentroid | null>;
  getSuburbCentroid(suburb: string, postcode: string | null): Promise<PostcodeCentroid | null>;
  /** Schools in the suburb (trimmed, case-insensitive) that have both coordinates. */
  getSchoolsBySuburb(suburb: string, postcode: string | null): Promise<SchoolRecord[]>;
  getGeolocatableSchools(filters: SchoolSearchFilters): Promise<SchoolRecord[]>;
  getSchoolById(id: number): Promise<SchoolRecord | null>;
  getSchoolsByIds(ids: number[]): Promise<SchoolRecord[]>;
  getDistinctLevels(): Promise<string[]>;
}

export interface SchoolSearchInput {
  suburb?: string | null;
  postcode?: string | null;
  radiusKm: number;
  filters?: SchoolSearchFilters;
  limit?: number;
}

export type SchoolSearchOutcome =
  | {
      status: "FOUND";
      location: ResolvedLocation;
      radiusKm: number;
      filters: SchoolSearchFilters;
      schools: SchoolSearchResult[];
      levels: string[];
    }
  | {
      status: "MISSING_LOCATION";
    }
  | {
      status: "LOCATION_NOT_FOUND";
    };

export type SchoolComparisonOutcome =
  | {
      status: "FOUND";
      schools: SchoolDisplay[];
    }
  | {
      status: "SCHOOLS_NOT_FOUND";
      missingIds: number[];
    };

export interface SchoolFinderService {
  searchNearby(input: SchoolSearchInput): Promise<SchoolSearchOutcome>;
  getSchool(id: number): Promise<SchoolRecord | null>;
  compareSchools(ids: number[], distancesKm: number[]): Promise<SchoolComparisonOutcome>;
  listLevels(): Promise<string[]>;
}

export interface LocationResolver {
  resolve(suburb?: string | null, postcode?: string | null): Promise<ResolvedLocation | null>;
}

export interface SchoolSearchEngine {
  search(
    center: Coordinates,
    radiusKm: number,
    filters?: SchoolSearchFilters,
    limit?: number
  ): Promise<SchoolSearchResult[]>;
}
