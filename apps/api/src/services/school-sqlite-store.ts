import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import sqlJs, { type BindParams, type Database, type SqlJsStatic } from "sql.js";
import type {
  NewSchoolRecord,
  PostcodeCentroid,
  SchoolDataSource,
  SchoolRecord,
  SchoolSearchFilters
} from "../types/domain.js";

export const IN_MEMORY_DATABASE = ":memory:";
export const DEFAULT_INSERT_BATCH_SIZE = 100;

const SCHOOL_COLUMNS = {
  schoolCode: "school_code",
  ageId: "age_id",
  schoolName: "school_name",
  street: "street",
  townSuburb: "town_suburb",
  postcode: "postcode",
  latitude: "latitude",
  longitude: "longitude",
  phone: "phone",
  schoolEmail: "school_email",
  website: "website",
  fax: "fax",
  latestYearEnrolmentFte: "latest_year_enrolment_fte",
  indigenousPct: "indigenous_pct",
  lbotePct: "lbote_pct",
  icseaValue: "icsea_value",
  levelOfSchooling: "level_of_schooling",
  selectiveSchool: "selective_school",
  opportunityClass: "opportunity_class",
  schoolSpecialtyType: "school_specialty_type",
  schoolSubtype: "school_subtype",
  supportClasses: "support_classes",
  preschoolInd: "preschool_ind",
  distanceEducation: "distance_education",
  intensiveEnglishCentre: "intensive_english_centre",
  schoolGender: "school_gender",
  lateOpeningSchool: "late_opening_school",
  date1stTeacher: "date_1st_teacher",
  dateExtracted: "date_extracted",
  lga: "lga",
  electorateFrom2023: "electorate_from_2023",
  electorate2015To2022: "electorate_2015_2022",
  fedElectorateFrom2025: "fed_electorate_from_2025",
  fedElectorate2016To2024: "fed_electorate_2016_2024",
  operationalDirectorate: "operational_directorate",
  principalNetwork: "principal_network",
  operationalDirectorateOffice: "operational_directorate_office",
  operationalDirectorateOfficePhone: "operational_directorate_office_phone",
  operationalDirectorateOfficeAddress: "operational_directorate_office_address",
  facsDistrict: "facs_district",
  localHealthDistrict: "local_health_district",
  aecgRegion: "aecg_region",
  asgsRemoteness: "asgs_remoteness",
  assetsUnit: "assets_unit",
  sa4: "sa4",
  foeiValue: "foei_value"
} as const satisfies Record<keyof NewSchoolRecord, string>;

const REAL_COLUMNS = new Set<string>(["latitude", "longitude", "latest_year_enrolment_fte"]);
const INTEGER_COLUMNS = new Set<string>(["icsea_value", "foei_value"]);
const INDEXED_COLUMNS = [
  "school_code",
  "school_name",
  "town_suburb",
  "postcode",
  "latitude",
  "longitude",
  "level_of_schooling",
  "selective_school",
  "opportunity_class",
  "preschool_ind",
  "distance_education",
  "intensive_english_centre",
  "school_gender"
] as const;

const schoolFieldEntries = Object.entries(SCHOOL_COLUMNS);

const SCHOOL_SELECT_LIST = [
  "id",
  ...schoolFieldEntries.map(([field, column]) => `${column} AS ${field}`)
].join(", ");

const columnType = (column: string): string => {
  if (REAL_COLUMNS.has(column)) {
    return "REAL";
  }

  return INTEGER_COLUMNS.has(column) ? "INTEGER" : "TEXT";
};

const SCHOOLS_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS schools (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ${schoolFieldEntries.map(([, column]) => `${column} ${columnType(column)}`).join(",\n    ")}
  );
  ${INDEXED_COLUMNS.map(
    (column) => `CREATE INDEX IF NOT EXISTS ix_schools_${column} ON schools (${column});`
  ).join("\n  ")}
`;

const POSTCODES_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS postcodes (
    postcode TEXT PRIMARY KEY,
    latitude REAL NOT NULL,
    longitude REAL NOT NULL,
    suburb TEXT
  );
  CREATE INDEX IF NOT EXISTS ix_postcodes_suburb ON postcodes (suburb);
`;

const INSERT_SCHOOL_SQL = `
  INSERT INTO schools (${schoolFieldEntries.map(([, column]) => column).join(", ")})
  VALUES (${schoolFieldEntries.map(([field]) => `@${field}`).join(", ")})
`;

const UPSERT_POSTCODE_SQL = `
  INSERT INTO postcodes (postcode, latitude, longitude, suburb)
  VALUES (@postcode, @latitude, @longitude, @suburb)
  ON CONFLICT(postcode) DO UPDATE SET
    latitude = excluded.latitude,
    longitude = excluded.longitude,
    suburb = excluded.suburb
`;

const chunk = <T>(values: T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    batches.push(values.slice(index, index + size));
  }

  return batches;
};

const toSchoolParams = (school: NewSchoolRecord): BindParams =>
  Object.fromEntries(Object.entries(school).map(([field, value]) => [`@${field}`, value]));

const toPostcodeParams = (postcode: PostcodeCentroid): BindParams => ({
  "@postcode": postcode.postcode,
  "@latitude": postcode.latitude,
  "@longitude": postcode.longitude,
  "@suburb": postcode.suburb
});

let sqlJsModule: Promise<SqlJsStatic> | undefined;

// sql.js is CommonJS; under NodeNext its init function is reached through `default`.
const loadSqlJs = (): Promise<SqlJsStatic> => {
  sqlJsModule ??= sqlJs.default();
  return sqlJsModule;
};

interface SchoolSqliteStoreOptions {
  insertBatchSize?: number;
}

/**
 * SQLite store running on sql.js. The database lives in memory; a file-backed
 * store is read from `databasePath` when opened and written back by `save()`.
 */
export class SchoolSqliteStore implements SchoolDataSource {
  private readonly db: Database;

  private readonly databasePath: string;

  private readonly insertBatchSize: number;

  private constructor(db: Database, databasePath: string, options?: SchoolSqliteStoreOptions) {
    this.db = db;
    this.databasePath = databasePath;
    this.db.exec(SCHOOLS_TABLE_DDL);
    this.db.exec(POSTCODES_TABLE_DDL);
    this.insertBatchSize = Math.max(1, options?.insertBatchSize ?? DEFAULT_INSERT_BATCH_SIZE);
  }

  static async open(
    databasePath: string,
    options?: SchoolSqliteStoreOptions
  ): Promise<SchoolSqliteStore> {
    const SQL = await loadSqlJs();
    const db =
      databasePath !== IN_MEMORY_DATABASE && existsSync(databasePath)
        ? new SQL.Database(readFileSync(databasePath))
        : new SQL.Database();

    return new SchoolSqliteStore(db, databasePath, options);
  }

  /** Writes the database to its file; a no-op for in-memory stores. */
  save(): void {
    if (this.databasePath === IN_MEMORY_DATABASE) {
      return;
    }

    mkdirSync(dirname(this.databasePath), { recursive: true });
    writeFileSync(this.databasePath, this.db.export());
  }

  close(): void {
    this.db.close();
  }

  /** Inserts in one transaction per batch; returns the number of rows written. */
  insertSchools(schools: NewSchoolRecord[]): number {
    for (const batch of chunk(schools, this.insertBatchSize)) {
      this.runInTransaction(INSERT_SCHOOL_SQL, batch.map(toSchoolParams));
    }

    return schools.length;
  }

  upsertPostcodes(postcodes: PostcodeCentroid[]): number {
    for (const batch of chunk(postcodes, this.insertBatchSize)) {
      this.runInTransaction(UPSERT_POSTCODE_SQL, batch.map(toPostcodeParams));
    }

    return postcodes.length;
  }

  clear(): void {
    this.db.exec("DELETE FROM schools; DELETE FROM postcodes;");
  }

  countSchools(): number {
    const [row] = this.selectRows<{ count: number }>("SELECT COUNT(*) AS count FROM schools");
    return row.count;
  }

  countPostcodes(): number {
    const [row] = this.selectRows<{ count: number }>("SELECT COUNT(*) AS count FROM postcodes");
    return row.count;
  }

  async getPostcodeCentroid(postcode: string): Promise<PostcodeCentroid | null> {
    const [row] = this.selectRows<PostcodeCentroid>(
      "SELECT postcode, latitude, longitude, suburb FROM postcodes WHERE postcode = ?",
      [postcode]
    );

    return row ?? null;
  }

  async getSuburbCentroid(
    suburb: string,
    postcode: string | null
  ): Promise<PostcodeCentroid | null> {
    const clauses = ["suburb = ?"];
    const params: string[] = [suburb];
    if (postcode !== null) {
      clauses.push("postcode = ?");
      params.push(postcode);
    }

    const [row] = this.selectRows<PostcodeCentroid>(
      `SELECT postcode, latitude, longitude, suburb FROM postcodes WHERE ${clauses.join(
        " AND "
      )} ORDER BY postcode LIMIT 1`,
      params
    );

    return row ?? null;
  }

  async getSchoolsBySuburb(suburb: string, postcode: string | null): Promise<SchoolRecord[]> {
    const clauses = [
      "lower(trim(town_suburb)) = ?",
      "latitude IS NOT NULL",
      "longitude IS NOT NULL"
    ];
    const params: string[] = [suburb.trim().toLowerCase()];
    if (postcode !== null) {
      clauses.push("postcode = ?");
      params.push(postcode);
    }

    return this.selectSchools(clauses, params);
  }

  async getGeolocatableSchools(filters: SchoolSearchFilters): Promise<SchoolRecord[]> {
    const clauses = ["latitude IS NOT NULL", "longitude IS NOT NULL"];
    const params: string[] = [];

    if (filters.level) {
      clauses.push("level_of_schooling = ?");
      params.push(filters.level);
    }

    if (filters.hasPreschool) {
      clauses.push("preschool_ind = 'Y'");
    }

    if (filters.hasIntensiveEnglish) {
      clauses.push("intensive_english_centre = 'Y'");
    }

    if (filters.hasOpportunityClass) {
      clauses.push("opportunity_class = 'Y'");
    }

    if (filters.notSelective) {
      clauses.push("(selective_school = 'Not Selective' OR selective_school IS NULL)");
    }

    if (filters.hasDistanceEducation) {
      clauses.push("distance_education = 'Y'");
    }

    return this.selectSchools(clauses, params);
  }

  async getSchoolById(id: number): Promise<SchoolRecord | null> {
    const [row] = this.selectRows<SchoolRecord>(
      `SELECT ${SCHOOL_SELECT_LIST} FROM schools WHERE id = ?`,
      [id]
    );

    return row ?? null;
  }

  async getSchoolsByIds(ids: number[]): Promise<SchoolRecord[]> {
    if (!ids.length) {
      return [];
    }

    return this.selectRows<SchoolRecord>(
      `SELECT ${SCHOOL_SELECT_LIST} FROM schools WHERE id IN (${ids
        .map(() => "?")
        .join(", ")}) ORDER BY id`,
      ids
    );
  }

  async getDistinctLevels(): Promise<string[]> {
    const rows = this.selectRows<{ level: string }>(
      "SELECT DISTINCT level_of_schooling AS level FROM schools WHERE level_of_schooling IS NOT NULL AND level_of_schooling != '' ORDER BY level_of_schooling"
    );

    return rows.map((row) => row.level);
  }

  private selectSchools(clauses: string[], params: string[]): SchoolRecord[] {
    return this.selectRows<SchoolRecord>(
      `SELECT ${SCHOOL_SELECT_LIST} FROM schools WHERE ${clauses.join(" AND ")} ORDER BY id`,
      params
    );
  }

  private selectRows<T>(sql: string, params: BindParams = []): T[] {
    const statement = this.db.prepare(sql, params);
    try {
      const rows: T[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject() as T);
      }

      return rows;
    } finally {
      statement.free();
    }
  }

  private runInTransaction(sql: string, rows: BindParams[]): void {
    const statement = this.db.prepare(sql);
    this.db.exec("BEGIN TRANSACTION");
    try {
      for (const params of rows) {
        statement.run(params);
      }

      this.db.exec("COMMIT");
    } catch (error) {
      this.db.exec("ROLLBACK");
      throw error;
    } finally {
      statement.free();
    }
  }
}
