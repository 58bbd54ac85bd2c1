import {
  DuckDBInstance,
  DuckDBTypeId,
  JsonDuckDBValueConverter,
  listValue,
  structValue,
  type DuckDBConnection,
  type DuckDBValue,
  type DuckDBValueConverter,
  type Json,
} from "@duckdb/node-api";
import { createLogger } from "../utils/logger";
import type { BindValue, Cursor, DatabaseHandle, OpenOptions, QueryResult } from "./db";
import type { Row } from "../types";

const logger = createLogger("duckdb");

/** Arrays bind as LIST and objects as STRUCT, nested values included. */
export function toDuckDBValue(value: BindValue): DuckDBValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return listValue(value.map(toDuckDBValue));
  return structValue(Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toDuckDBValue(v)])));
}

/**
 * The driver's JSON conversion (DATE, TIME, TIMESTAMP and BLOB as their text
 * forms), except that safe integers and decimals come back as numbers.
 */
export const toJsonValue: DuckDBValueConverter<Json> = (value, type, converter) => {
  if (typeof value === "bigint") {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  if (type.typeId === DuckDBTypeId.DECIMAL && value !== null) return Number(String(value));
  return JsonDuckDBValueConverter(value, type, converter);
};

class DuckDBCursor implements Cursor {
  constructor(private connection: DuckDBConnection) {}

  async run(sql: string, params: BindValue[] = []): Promise<QueryResult> {
    logger.debug("sql_try", { sql, params });
    const reader = await this.connection.runAndReadAll(sql, params.length > 0 ? params.map(toDuckDBValue) : undefined);
    const rows: Row[] = reader.convertRowObjects(toJsonValue);
    return { columns: reader.columnNames(), rows };
  }

  close(): void {
    this.connection.closeSync();
  }
}

class DuckDBHandle implements DatabaseHandle {
  constructor(private instance: DuckDBInstance) {}

  async connect(): Promise<Cursor> {
    return new DuckDBCursor(await this.instance.connect());
  }

  close(): void {
    this.instance.closeSync();
  }
}

export async function openDuckDB(path: string, options: OpenOptions): Promise<DatabaseHandle> {
  const config: Record<string, string> = options.readOnly ? { access_mode: "READ_ONLY" } : {};
  const instance = await DuckDBInstance.create(path, config);
  logger.info("duckdb_opened", { path, readOnly: options.readOnly });
  return new DuckDBHandle(instance);
}
