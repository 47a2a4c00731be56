import { hasCoordinates } from "../../../../packages/shared/src/distance.js";
import {
  normalizePostcode,
  normalizeSuburb,
  toOptionalText
} from "../../../../packages/shared/src/text-utils.js";
import type {
  Coordinates,
  LocationResolver,
  LocationSource,
  ResolvedLocation,
  SchoolDataSource
} from "../types/domain.js";

export interface LocationQuery {
  /** Trimmed and title-cased. */
  suburb: string | null;
  /** Trimmed. */
  postcode: string | null;
}

export interface LocationStrategy {
  source: LocationSource;
  resolve(query: LocationQuery, dataSource: SchoolDataSource): Promise<Coordinates | null>;
}

interface SchoolLocationResolverOptions {
  strategies?: LocationStrategy[];
  verbose?: boolean;
}

export const buildLocationQuery = (
  suburb?: string | null,
  postcode?: string | null
): LocationQuery => {
  const suburbText = toOptionalText(suburb);
  const postcodeText = toOptionalText(postcode);

  return {
    suburb: suburbText === null ? null : normalizeSuburb(suburbText),
    postcode: postcodeText === null ? null : normalizePostcode(postcodeText)
  };
};

const median = (sortedValues: number[]): number => {
  const middle = Math.floor(sortedValues.length / 2);
  if (sortedValues.length % 2 === 0) {
    return (sortedValues[middle - 1] + sortedValues[middle]) / 2;
  }

  return sortedValues[middle];
};

/**
 * Per-axis median: latitudes and longitudes are sorted independently, so the
 * result need not be the position of any single input point.
 */
export const medianCoordinates = (points: Coordinates[]): Coordinates | null => {
  if (!points.length) {
    return null;
  }

  const latitudes = points.map((point) => point.latitude).sort((left, right) => left - right);
  const longitudes = points.map((point) => point.longitude).sort((left, right) => left - right);

  return {
    latitude: median(latitudes),
    longitude: median(longitudes)
  };
};

export const postcodeCentroidStrategy: LocationStrategy = {
  source: "POSTCODE_CENTROID",
  resolve: async ({ postcode }, dataSource) => {
    if (postcode === null) {
      return null;
    }

    const centroid = await dataSource.getPostcodeCentroid(postcode);
    return centroid ? { latitude: centroid.latitude, longitude: centroid.longitude } : null;
  }
};

export const suburbCentroidStrategy: LocationStrategy = {
  source: "SUBURB_CENTROID",
  resolve: async ({ suburb, postcode }, dataSource) => {
    if (suburb === null) {
      return null;
    }

    const centroid = await dataSource.getSuburbCentroid(suburb, postcode);
    return centroid ? { latitude: centroid.latitude, longitude: centroid.longitude } : null;
  }
};

export const schoolMedianStrategy: LocationStrategy = {
  source: "SCHOOL_MEDIAN",
  resolve: async ({ suburb, postcode }, dataSource) => {
    if (suburb === null) {
      return null;
    }

    const schools = await dataSource.getSchoolsBySuburb(suburb, postcode);
    return medianCoordinates(
      schools.filter(hasCoordinates).map((school) => ({
        latitude: school.latitude,
        longitude: school.longitude
      }))
    );
  }
};

export const DEFAULT_LOCATION_STRATEGIES: readonly LocationStrategy[] = [
  postcodeCentroidStrategy,
  suburbCentroidStrategy,
  schoolMedianStrategy
];

export class SchoolLocationResolver implements LocationResolver {
  private readonly dataSource: SchoolDataSource;

  private readonly strategies: readonly LocationStrategy[];

  private readonly log: (message: string) => void;

  constructor(dataSource: SchoolDataSource, options?: SchoolLocationResolverOptions) {
    this.dataSource = dataSource;
    this.strategies = options?.strategies ?? DEFAULT_LOCATION_STRATEGIES;
    this.log = options?.verbose ? (message) => console.log(`  ${message}`) : () => {};
  }

  async resolve(
    suburb?: string | null,
    postcode?: string | null
  ): Promise<ResolvedLocation | null> {
    const query = buildLocationQuery(suburb, postcode);
    if (query.suburb === null && query.postcode === null) {
      return null;
    }

    for (const strategy of this.strategies) {
      const coordinates = await strategy.resolve(query, this.dataSource);
      if (coordinates) {
        this.log(
          `[resolve] ${query.suburb ?? "-"} ${query.postcode ?? "-"} matched ${strategy.source}`
        );
        return { ...coordinates, source: strategy.source };
      }
    }

    this.log(`[resolve] ${query.suburb ?? "-"} ${query.postcode ?? "-"} not found`);
    return null;
  }
}
