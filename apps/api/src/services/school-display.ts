import type { SchoolDisplay, SchoolRecord } from "../types/domain.js";

const NOT_AVAILABLE = "Not available";
const DATA_NOT_AVAILABLE = "Data not available";
const SUPPRESSED_VALUE = "np";

const GENDER_LABELS: Record<string, string> = {
  Coed: "Boys & Girls",
  "Co-ed": "Boys & Girls",
  "Co-educational": "Boys & Girls",
  Boys: "Boys Only",
  Girls: "Girls Only"
};

const SMALL_SCHOOL_MAX_ENROLMENT = 300;
const MEDIUM_SCHOOL_MAX_ENROLMENT = 800;

const isFlagSet = (value: string | null | undefined): boolean =>
  typeof value === "string" && value.toUpperCase() === "Y";

/** Unknown codes pass through unchanged. */
export const formatGender = (gender: string | null | undefined): string => {
  if (!gender) {
    return NOT_AVAILABLE;
  }

  return Object.hasOwn(GENDER_LABELS, gender) ? GENDER_LABELS[gender] : gender;
};

export const formatSchoolSize = (enrolment: number | null | undefined): string => {
  if (enrolment === null || enrolment === undefined || Number.isNaN(enrolment)) {
    return NOT_AVAILABLE;
  }

  if (enrolment < SMALL_SCHOOL_MAX_ENROLMENT) {
    return "Small School";
  }

  if (enrolment <= MEDIUM_SCHOOL_MAX_ENROLMENT) {
    return "Medium School";
  }

  return "Large School";
};

/** Ties go to the even neighbour, so 12.5 rounds to 12 and 13.5 to 14. */
export const roundHalfToEven = (value: number): number => {
  const lower = Math.floor(value);
  const fraction = value - lower;
  if (fraction !== 0.5) {
    return Math.round(value);
  }

  return lower % 2 === 0 ? lower : lower + 1;
};

export const formatLbote = (lbotePct: string | null | undefined): string => {
  if (!lbotePct || lbotePct.trim().toLowerCase() === SUPPRESSED_VALUE) {
    return DATA_NOT_AVAILABLE;
  }

  const trimmed = lbotePct.trim();
  const percentage = Number(trimmed);
  if (!trimmed || !Number.isFinite(percentage)) {
    return DATA_NOT_AVAILABLE;
  }

  return `${roundHalfToEven(percentage)}% Multi-lingual background`;
};

export const formatIntensiveEnglish = (value: string | null | undefined): string | null =>
  isFlagSet(value) ? "English Language Support Centre" : null;

export const formatOpportunityClass = (value: string | null | undefined): string | null =>
  isFlagSet(value) ? "Advanced Classes (OC)" : null;

export const formatSpecialty = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  if (trimmed.toLowerCase() === "comprehensive") {
    return "Comprehensive (standard curriculum)";
  }

  return trimmed;
};

export const collectSpecialFeatures = (school: SchoolRecord): string[] =>
  [
    formatIntensiveEnglish(school.intensiveEnglishCentre),
    formatOpportunityClass(school.opportunityClass),
    formatSpecialty(school.schoolSpecialtyType)
  ].filter((feature): feature is string => feature !== null);

export const transformSchoolForDisplay = (
  school: SchoolRecord,
  distanceKm: number | null = null
): SchoolDisplay => ({
  id: school.id,
  schoolName: school.schoolName || NOT_AVAILABLE,
  levelOfSchooling: school.levelOfSchooling || NOT_AVAILABLE,
  townSuburb: school.townSuburb || NOT_AVAILABLE,
  postcode: school.postcode,
  street: school.street || NOT_AVAILABLE,
  gender: formatGender(school.schoolGender),
  schoolSize: formatSchoolSize(school.latestYearEnrolmentFte),
  enrolmentRaw: school.latestYearEnrolmentFte,
  community: formatLbote(school.lbotePct),
  specialFeatures: collectSpecialFeatures(school),
  hasIntensiveEnglish: isFlagSet(school.intensiveEnglishCentre),
  hasOpportunityClass: isFlagSet(school.opportunityClass),
  specialtyType: school.schoolSpecialtyType,
  selectiveSchool: school.selectiveSchool || NOT_AVAILABLE,
  icseaValue: school.icseaValue,
  phone: school.phone,
  schoolEmail: school.schoolEmail,
  website: school.website,
  distanceKm
});

/** Distances pair with schools by position; schools past the end get `null`. */
export const transformSchoolsForComparison = (
  schools: SchoolRecord[],
  distancesKm: number[] = []
): SchoolDisplay[] =>
  schools.map((school, index) =>
    transformSchoolForDisplay(school, index < distancesKm.length ? distancesKm[index] : null)
  );
