import Database from "better-sqlite3";
import type { JsonValue, Row } from "@/lib/contracts";
import { DatasetUnavailableError, FilterSyntaxError } from "@/server/errors";
import { gafColumnNames, readGafFile } from "@/server/annotations/gaf";
import { logEvent } from "@/server/telemetry";

export type TabularResult = {
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
};

/** The genome-annotation table, queryable with one read-only SQL statement. */
export interface AnnotationDataset {
  readonly table: string;
  readonly size: number;
  query(sql: string, maxRows: number): TabularResult;
}

const TABLE = "gaf";
const INSERT_BATCH = 5_000;

function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  return String(value);
}

function toRow(record: unknown, columns: string[]): Row {
  const row: Row = {};
  if (typeof record !== "object" || record === null) return row;
  const entries = new Map(Object.entries(record));
  for (const column of columns) {
    row[column] = toJsonValue(entries.get(column));
  }
  return row;
}

/** Pads or trims a row to one value per GAF column. */
function toColumnValues(row: readonly string[]): string[] {
  return gafColumnNames.map((_, index) => row[index] ?? "");
}

function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/;+\s*$/, "").trim();
}

export class SqliteAnnotationDataset implements AnnotationDataset {
  readonly table = TABLE;
  private readonly db: Database.Database;
  private count = 0;

  private constructor() {
    this.db = new Database(":memory:");
    const columns = gafColumnNames.map((name) => `"${name}" TEXT`).join(", ");
    this.db.exec(`CREATE TABLE ${TABLE} (${columns})`);
  }

  static fromRows(rows: Iterable<string[]>): SqliteAnnotationDataset {
    const dataset = new SqliteAnnotationDataset();
    dataset.insertAll(rows);
    return dataset.seal();
  }

  static async fromGafFile(filePath: string): Promise<SqliteAnnotationDataset> {
    const startedAt = Date.now();
    const dataset = new SqliteAnnotationDataset();
    let batch: string[][] = [];
    try {
      for await (const row of readGafFile(filePath)) {
        batch.push(row);
        if (batch.length >= INSERT_BATCH) {
          dataset.insertAll(batch);
          batch = [];
        }
      }
      dataset.insertAll(batch);
    } catch (error) {
      dataset.close();
      throw error;
    }
    if (dataset.size === 0) {
      dataset.close();
      throw new DatasetUnavailableError(`GAF file has no annotation rows: ${filePath}`);
    }
    logEvent("gaf.loaded", {
      filePath,
      rows: dataset.size,
      durationMs: Date.now() - startedAt,
    });
    return dataset.seal();
  }

  get size(): number {
    return this.count;
  }

  query(sql: string, maxRows: number): TabularResult {
    const statement = stripTrailingSemicolons(sql);
    if (!statement) {
      throw new FilterSyntaxError("Empty SQL statement");
    }

    let prepared: Database.Statement;
    try {
      // prepare() rejects input holding more than one statement
      prepared = this.db.prepare(statement);
    } catch (error) {
      throw this.toFilterError(error, statement);
    }
    if (!prepared.reader) {
      throw new FilterSyntaxError("Only a single read-only SELECT statement is allowed", {
        query: statement,
      });
    }

    const columns = prepared.columns().map((column) => column.name);
    const rows: Row[] = [];
    let rowCount = 0;
    try {
      for (const record of prepared.iterate()) {
        rowCount += 1;
        if (rows.length < maxRows) rows.push(toRow(record, columns));
      }
    } catch (error) {
      throw this.toFilterError(error, statement);
    }

    return { columns, rows, rowCount, truncated: rowCount > rows.length };
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private insertAll(rows: Iterable<string[]>): void {
    const placeholders = gafColumnNames.map(() => "?").join(", ");
    const insert = this.db.prepare(`INSERT INTO ${TABLE} VALUES (${placeholders})`);
    const insertMany = this.db.transaction((batch: Iterable<string[]>) => {
      for (const row of batch) {
        insert.run(toColumnValues(row));
        this.count += 1;
      }
    });
    insertMany(rows);
  }

  private seal(): this {
    this.db.exec(`CREATE INDEX idx_${TABLE}_symbol ON ${TABLE} (DB_Object_Symbol)`);
    this.db.exec(`CREATE INDEX idx_${TABLE}_go ON ${TABLE} (GO_ID)`);
    this.db.pragma("query_only = ON");
    return this;
  }

  private toFilterError(error: unknown, statement: string): FilterSyntaxError {
    if (error instanceof Database.SqliteError) {
      return new FilterSyntaxError(`SQLite rejected the query: ${error.message}`, {
        code: error.code,
        query: statement,
      });
    }
    // better-sqlite3 raises RangeError for multi-statement input
    return new FilterSyntaxError(error instanceof Error ? error.message : String(error), {
      query: statement,
    });
  }
}

/**
 * Loads the GAF file on first use and reuses the table afterwards. A failed
 * load is not cached, so a file that appears later is picked up.
 */
export function createGafDatasetProvider(filePath: string): () => Promise<AnnotationDataset> {
  let pending: Promise<AnnotationDataset> | null = null;
  return () => {
    if (!pending) {
      const load = SqliteAnnotationDataset.fromGafFile(filePath);
      pending = load;
      void load.catch(() => {
        if (pending === load) pending = null;
      });
    }
    return pending;
  };
}
