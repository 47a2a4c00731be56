import {
  hasCoordinates,
  haversineDistanceKm,
  roundDistanceKm
} from "../../../../packages/shared/src/distance.js";
import type {
  Coordinates,
  SchoolDataSource,
  SchoolRecord,
  SchoolSearchEngine,
  SchoolSearchFilters,
  SchoolSearchResult
} from "../types/domain.js";

export const DEFAULT_SEARCH_LIMIT = 50;

const FLAG_VALUE = "Y";
const NOT_SELECTIVE_VALUE = "Not Selective";

export interface SchoolFilterPredicate {
  key: keyof SchoolSearchFilters;
  isActive(filters: SchoolSearchFilters): boolean;
  matches(school: SchoolRecord, filters: SchoolSearchFilters): boolean;
}

type FlagFilterKey = Exclude<keyof SchoolSearchFilters, "level" | "notSelective">;

type FlagField = "preschoolInd" | "intensiveEnglishCentre" | "opportunityClass" | "distanceEducation";

const flagPredicate = (key: FlagFilterKey, field: FlagField): SchoolFilterPredicate => ({
  key,
  isActive: (filters) => filters[key] === true,
  matches: (school) => school[field] === FLAG_VALUE
});

export const SCHOOL_FILTER_PREDICATES: readonly SchoolFilterPredicate[] = [
  {
    key: "level",
    isActive: (filters) => Boolean(filters.level),
    matches: (school, filters) => school.levelOfSchooling === filters.level
  },
  flagPredicate("hasPreschool", "preschoolInd"),
  flagPredicate("hasIntensiveEnglish", "intensiveEnglishCentre"),
  flagPredicate("hasOpportunityClass", "opportunityClass"),
  {
    // Unknown selectivity counts as non-selective.
    key: "notSelective",
    isActive: (filters) => filters.notSelective === true,
    matches: (school) =>
      school.selectiveSchool === NOT_SELECTIVE_VALUE || school.selectiveSchool === null
  },
  flagPredicate("hasDistanceEducation", "distanceEducation")
];

export const matchesSchoolFilters = (
  school: SchoolRecord,
  filters: SchoolSearchFilters,
  predicates: readonly SchoolFilterPredicate[] = SCHOOL_FILTER_PREDICATES
): boolean =>
  predicates.every(
    (predicate) => !predicate.isActive(filters) || predicate.matches(school, filters)
  );

export const toSearchResult = (
  school: SchoolRecord & Coordinates,
  distanceKm: number
): SchoolSearchResult => ({
  id: school.id,
  schoolCode: school.schoolCode,
  schoolName: school.schoolName,
  street: school.street,
  townSuburb: school.townSuburb,
  postcode: school.postcode,
  phone: school.phone,
  schoolEmail: school.schoolEmail,
  website: school.website,
  latestYearEnrolmentFte: school.latestYearEnrolmentFte,
  indigenousPct: school.indigenousPct,
  lbotePct: school.lbotePct,
  icseaValue: school.icseaValue,
  levelOfSchooling: school.levelOfSchooling,
  selectiveSchool: school.selectiveSchool,
  schoolSpecialtyType: school.schoolSpecialtyType,
  schoolSubtype: school.schoolSubtype,
  schoolGender: school.schoolGender,
  latitude: school.latitude,
  longitude: school.longitude,
  distanceKm: roundDistanceKm(distanceKm),
  preschoolInd: school.preschoolInd,
  intensiveEnglishCentre: school.intensiveEnglishCentre,
  opportunityClass: school.opportunityClass,
  distanceEducation: school.distanceEducation
});

export class ProximitySchoolSearch implements SchoolSearchEngine {
  private readonly dataSource: SchoolDataSource;

  private readonly predicates: readonly SchoolFilterPredicate[];

  constructor(
    dataSource: SchoolDataSource,
    predicates: readonly SchoolFilterPredicate[] = SCHOOL_FILTER_PREDICATES
  ) {
    this.dataSource = dataSource;
    this.predicates = predicates;
  }

  async search(
    center: Coordinates,
    radiusKm: number,
    filters: SchoolSearchFilters = {},
    limit = DEFAULT_SEARCH_LIMIT
  ): Promise<SchoolSearchResult[]> {
    const candidates = await this.dataSource.getGeolocatableSchools(filters);

    // Distances are compared unrounded; rounding only applies to the payload.
    const withinRadius = candidates
      .filter(hasCoordinates)
      .filter((school) => matchesSchoolFilters(school, filters, this.predicates))
      .map((school) => ({
        school,
        distanceKm: haversineDistanceKm(center, school)
      }))
      .filter(({ distanceKm }) => distanceKm <= radiusKm);

    withinRadius.sort((left, right) => left.distanceKm - right.distanceKm);

    return withinRadius
      .slice(0, Math.max(0, Math.floor(limit)))
      .map(({ school, distanceKm }) => toSearchResult(school, distanceKm));
  }
}
