export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Tier of the location resolver that produced a coordinate.
 * - POSTCODE_CENTROID: exact postcode match in the centroid table.
 * - SUBURB_CENTROID: exact suburb match in the centroid table.
 * - SCHOOL_MEDIAN: per-axis median of schools recorded in the suburb.
 */
export type LocationSource = "POSTCODE_CENTROID" | "SUBURB_CENTROID" | "SCHOOL_MEDIAN";

export interface ResolvedLocation extends Coordinates {
  source: LocationSource;
}

export interface PostcodeCentroid {
  postcode: string;
  latitude: number;
  longitude: number;
  suburb: string | null;
}

export interface SchoolRecord {
  id: number;
  schoolCode: string | null;
  ageId: string | null;
  schoolName: string | null;
  street: string | null;
  townSuburb: string | null;
  postcode: string | null;
  latitude: number | null;
  longitude: number | null;
  phone: string | null;
  schoolEmail: string | null;
  website: string | null;
  fax: string | null;
  latestYearEnrolmentFte: number | null;
  /** Percentage as published; "np" marks a suppressed value. */
  indigenousPct: string | null;
  /** Percentage as published; "np" marks a suppressed value. */
  lbotePct: string | null;
  icseaValue: number | null;
  levelOfSchooling: string | null;
  selectiveSchool: string | null;
  opportunityClass: string | null;
  schoolSpecialtyType: string | null;
  schoolSubtype: string | null;
  supportClasses: string | null;
  preschoolInd: string | null;
  distanceEducation: string | null;
  intensiveEnglishCentre: string | null;
  schoolGender: string | null;
  lateOpeningSchool: string | null;
  date1stTeacher: string | null;
  dateExtracted: string | null;
  lga: string | null;
  electorateFrom2023: string | null;
  electorate2015To2022: string | null;
  fedElectorateFrom2025: string | null;
  fedElectorate2016To2024: string | null;
  operationalDirectorate: string | null;
  principalNetwork: string | null;
  operationalDirectorateOffice: string | null;
  operationalDirectorateOfficePhone: string | null;
  operationalDirectorateOfficeAddress: string | null;
  facsDistrict: string | null;
  localHealthDistrict: string | null;
  aecgRegion: string | null;
  asgsRemoteness: string | null;
  assetsUnit: string | null;
  sa4: string | null;
  foeiValue: number | null;
}

export type NewSchoolRecord = Omit<SchoolRecord, "id">;

export interface SchoolSearchFilters {
  level?: string | null;
  hasPreschool?: boolean;
  hasIntensiveEnglish?: boolean;
  hasOpportunityClass?: boolean;
  notSelective?: boolean;
  hasDistanceEducation?: boolean;
}

export type SchoolSearchResult = Pick<
  SchoolRecord,
  | "id"
  | "schoolCode"
  | "schoolName"
  | "street"
  | "townSuburb"
  | "postcode"
  | "phone"
  | "schoolEmail"
  | "website"
  | "latestYearEnrolmentFte"
  | "indigenousPct"
  | "lbotePct"
  | "icseaValue"
  | "levelOfSchooling"
  | "selectiveSchool"
  | "schoolSpecialtyType"
  | "schoolSubtype"
  | "schoolGender"
  | "preschoolInd"
  | "intensiveEnglishCentre"
  | "opportunityClass"
  | "distanceEducation"
> &
  Coordinates & {
    distanceKm: number;
  };

export interface SchoolDisplay {
  id: number;
  schoolName: string;
  levelOfSchooling: string;
  townSuburb: string;
  postcode: string | null;
  street: string;
  gender: string;
  schoolSize: string;
  enrolmentRaw: number | null;
  community: string;
  specialFeatures: string[];
  hasIntensiveEnglish: boolean;
  hasOpportunityClass: boolean;
  specialtyType: string | null;
  selectiveSchool: string;
  icseaValue: number | null;
  phone: string | null;
  schoolEmail: string | null;
  website: string | null;
  distanceKm: number | null;
}
