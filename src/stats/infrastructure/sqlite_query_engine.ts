/**
 * SQLite-backed query engine for activity snapshots.
 *
 * Snapshots are opened read-only and only statements that return rows are
 * accepted, so a query can never change the fetched file.
 */
import Database from "better-sqlite3";
import { OpenError } from "../domain/errors";
import type { CellValue, ResultSet } from "../domain/types";
import type { QueryableResource, QueryEngine } from "../types/contracts";

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  return String(value);
}

function toRow(value: unknown): CellValue[] {
  if (!Array.isArray(value)) {
    throw new Error("expected raw row data from the SQLite driver");
  }
  return value.map(toCell);
}

class SqliteSnapshot implements QueryableResource {
  constructor(private readonly db: Database.Database) {}

  async query(sql: string): Promise<ResultSet> {
    const statement = this.db.prepare(sql);
    if (!statement.reader) {
      throw new Error("only statements that return rows are allowed");
    }
    const columns = statement.columns().map(column => column.name);
    const rows = statement.raw(true).all().map(toRow);
    return { columns, rows };
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}

export class SqliteQueryEngine implements QueryEngine {
  async open(path: string): Promise<QueryableResource> {
    let db: Database.Database | undefined;
    try {
      db = new Database(path, { readonly: true, fileMustExist: true });
      // The header is only validated on first read
      db.prepare("SELECT count(*) FROM sqlite_master").get();
    } catch (err) {
      db?.close();
      throw new OpenError(path, err);
    }
    return new SqliteSnapshot(db);
  }
}
