import type {
  NewSchoolRecord,
  PostcodeCentroid,
  SchoolDataSource,
  SchoolRecord,
  SchoolSearchFilters
} from "../apps/api/src/types/domain.js";

export const makeNewSchool = (overrides: Partial<NewSchoolRecord> = {}): NewSchoolRecord => ({
  schoolCode: null,
  ageId: null,
  schoolName: null,
  street: null,
  townSuburb: null,
  postcode: null,
  latitude: null,
  longitude: null,
  phone: null,
  schoolEmail: null,
  website: null,
  fax: null,
  latestYearEnrolmentFte: null,
  indigenousPct: null,
  lbotePct: null,
  icseaValue: null,
  levelOfSchooling: null,
  selectiveSchool: null,
  opportunityClass: null,
  schoolSpecialtyType: null,
  schoolSubtype: null,
  supportClasses: null,
  preschoolInd: null,
  distanceEducation: null,
  intensiveEnglishCentre: null,
  schoolGender: null,
  lateOpeningSchool: null,
  date1stTeacher: null,
  dateExtracted: null,
  lga: null,
  electorateFrom2023: null,
  electorate2015To2022: null,
  fedElectorateFrom2025: null,
  fedElectorate2016To2024: null,
  operationalDirectorate: null,
  principalNetwork: null,
  operationalDirectorateOffice: null,
  operationalDirectorateOfficePhone: null,
  operationalDirectorateOfficeAddress: null,
  facsDistrict: null,
  localHealthDistrict: null,
  aecgRegion: null,
  asgsRemoteness: null,
  assetsUnit: null,
  sa4: null,
  foeiValue: null,
  ...overrides
});

export const makeSchool = (
  id: number,
  overrides: Partial<NewSchoolRecord> = {}
): SchoolRecord => ({
  id,
  ...makeNewSchool({ schoolName: `School ${id}`, ...overrides })
});

/**
 * Array-backed data source. `getGeolocatableSchools` ignores the filters and
 * returns every record, including ones without coordinates, so the search
 * engine's own filtering is what tests observe.
 */
export class InMemorySchoolDataSource implements SchoolDataSource {
  readonly calls: string[] = [];

  constructor(
    private readonly schools: SchoolRecord[] = [],
    private readonly postcodes: PostcodeCentroid[] = []
  ) {}

  async getPostcodeCentroid(postcode: string): Promise<PostcodeCentroid | null> {
    this.calls.push(`getPostcodeCentroid:${postcode}`);
    return this.postcodes.find((entry) => entry.postcode === postcode) ?? null;
  }

  async getSuburbCentroid(
    suburb: string,
    postcode: string | null
  ): Promise<PostcodeCentroid | null> {
    this.calls.push(`getSuburbCentroid:${suburb}:${postcode ?? ""}`);
    return (
      this.postcodes.find(
        (entry) => entry.suburb === suburb && (postcode === null || entry.postcode === postcode)
      ) ?? null
    );
  }

  async getSchoolsBySuburb(suburb: string, postcode: string | null): Promise<SchoolRecord[]> {
    this.calls.push(`getSchoolsBySuburb:${suburb}:${postcode ?? ""}`);
    return this.schools.filter(
      (school) =>
        (school.townSuburb ?? "").trim().toLowerCase() === suburb.trim().toLowerCase() &&
        (postcode === null || school.postcode === postcode) &&
        school.latitude !== null &&
        school.longitude !== null
    );
  }

  async getGeolocatableSchools(_filters: SchoolSearchFilters): Promise<SchoolRecord[]> {
    this.calls.push("getGeolocatableSchools");
    return [...this.schools];
  }

  async getSchoolById(id: number): Promise<SchoolRecord | null> {
    return this.schools.find((school) => school.id === id) ?? null;
  }

  async getSchoolsByIds(ids: number[]): Promise<SchoolRecord[]> {
    return this.schools.filter((school) => ids.includes(school.id));
  }

  async getDistinctLevels(): Promise<string[]> {
    return [
      ...new Set(
        this.schools
          .map((school) => school.levelOfSchooling)
          .filter((level): level is string => Boolean(level))
      )
    ].sort();
  }
}
