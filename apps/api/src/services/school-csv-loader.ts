import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import type { NewSchoolRecord, PostcodeCentroid } from "../types/domain.js";

type CsvRow = Record<string, string | undefined>;

export interface PostcodeParseResult {
  postcodes: PostcodeCentroid[];
  skippedRows: number;
}

const parseCsvRows = (csvText: string): CsvRow[] =>
  parse(csvText, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  }) as CsvRow[];

/** Empty cells become null; other values are kept verbatim. */
const optionalCell = (row: CsvRow, column: string): string | null => row[column] || null;

const trimmedCell = (row: CsvRow, column: string): string | null =>
  (row[column] ?? "").trim() || null;

export const parseOptionalFloat = (value: string | undefined): number | null => {
  if (!value || !value.trim()) {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Accepts "123.0" style values and truncates toward zero. */
export const parseOptionalInteger = (value: string | undefined): number | null => {
  const parsed = parseOptionalFloat(value);
  return parsed === null ? null : Math.trunc(parsed);
};

export const schoolFromCsvRow = (row: CsvRow): NewSchoolRecord => ({
  schoolCode: optionalCell(row, "School_code"),
  ageId: optionalCell(row, "AgeID"),
  schoolName: optionalCell(row, "School_name"),
  street: optionalCell(row, "Street"),
  townSuburb: trimmedCell(row, "Town_suburb"),
  postcode: trimmedCell(row, "Postcode"),
  latitude: parseOptionalFloat(row.Latitude),
  longitude: parseOptionalFloat(row.Longitude),
  phone: optionalCell(row, "Phone"),
  schoolEmail: optionalCell(row, "School_Email"),
  website: optionalCell(row, "Website"),
  fax: optionalCell(row, "Fax"),
  latestYearEnrolmentFte: parseOptionalFloat(row.latest_year_enrolment_FTE),
  indigenousPct: optionalCell(row, "Indigenous_pct"),
  lbotePct: optionalCell(row, "LBOTE_pct"),
  icseaValue: parseOptionalInteger(row.ICSEA_value),
  levelOfSchooling: optionalCell(row, "Level_of_schooling"),
  selectiveSchool: optionalCell(row, "Selective_school"),
  opportunityClass: optionalCell(row, "Opportunity_class"),
  schoolSpecialtyType: optionalCell(row, "School_specialty_type"),
  schoolSubtype: optionalCell(row, "School_subtype"),
  supportClasses: optionalCell(row, "Support_classes"),
  preschoolInd: optionalCell(row, "Preschool_ind"),
  distanceEducation: optionalCell(row, "Distance_education"),
  intensiveEnglishCentre: optionalCell(row, "Intensive_english_centre"),
  schoolGender: optionalCell(row, "School_gender"),
  lateOpeningSchool: optionalCell(row, "Late_opening_school"),
  date1stTeacher: optionalCell(row, "Date_1st_teacher"),
  dateExtracted: optionalCell(row, "Date_extracted"),
  lga: optionalCell(row, "LGA"),
  electorateFrom2023: optionalCell(row, "electorate_from_2023"),
  electorate2015To2022: optionalCell(row, "electorate_2015_2022"),
  fedElectorateFrom2025: optionalCell(row, "fed_electorate_from_2025"),
  fedElectorate2016To2024: optionalCell(row, "fed_electorate_2016_2024"),
  operationalDirectorate: optionalCell(row, "Operational_directorate"),
  principalNetwork: optionalCell(row, "Principal_network"),
  operationalDirectorateOffice: optionalCell(row, "Operational_directorate_office"),
  operationalDirectorateOfficePhone: optionalCell(row, "Operational_directorate_office_phone"),
  operationalDirectorateOfficeAddress: optionalCell(
    row,
    "Operational_directorate_office_address"
  ),
  facsDistrict: optionalCell(row, "FACS_district"),
  localHealthDistrict: optionalCell(row, "Local_health_district"),
  aecgRegion: optionalCell(row, "AECG_region"),
  asgsRemoteness: optionalCell(row, "ASGS_remoteness"),
  assetsUnit: optionalCell(row, "Assets unit"),
  sa4: optionalCell(row, "SA4"),
  foeiValue: parseOptionalInteger(row.FOEI_Value)
});

export const parseSchoolsCsv = (csvText: string): NewSchoolRecord[] =>
  parseCsvRows(csvText).map(schoolFromCsvRow);

export const parsePostcodesCsv = (csvText: string): PostcodeParseResult => {
  const postcodes: PostcodeCentroid[] = [];
  let skippedRows = 0;

  for (const row of parseCsvRows(csvText)) {
    const postcode = trimmedCell(row, "postcode");
    const latitude = parseOptionalFloat(row.latitude);
    const longitude = parseOptionalFloat(row.longitude);

    if (postcode === null || latitude === null || longitude === null) {
      skippedRows += 1;
      continue;
    }

    postcodes.push({
      postcode,
      latitude,
      longitude,
      suburb: optionalCell(row, "suburb")
    });
  }

  return { postcodes, skippedRows };
};

export const readSchoolsCsv = async (filePath: string): Promise<NewSchoolRecord[]> =>
  parseSchoolsCsv(await readFile(filePath, "utf8"));

export const readPostcodesCsv = async (filePath: string): Promise<PostcodeParseResult> =>
  parsePostcodesCsv(await readFile(filePath, "utf8"));
