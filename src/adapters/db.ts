import type { JsonValue, Row } from "../types";

export type BindValue = JsonValue;

export type QueryResult = { columns: string[]; rows: Row[] };

/** A connection derived from a {@link DatabaseHandle}, used by one task at a time. */
export interface Cursor {
  run(sql: string, params?: BindValue[]): Promise<QueryResult>;
  close(): void;
}

/** The one physical database handle of the process. */
export interface DatabaseHandle {
  connect(): Promise<Cursor>;
  close(): void;
}

export type OpenOptions = { readOnly: boolean };

export type HandleOpener = (path: string, options: OpenOptions) => Promise<DatabaseHandle>;
