export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type MacroType = "scalar" | "table";

export type MacroDescriptor = {
  readonly name: string;
  readonly parameters: readonly string[];
  readonly parameter_types: readonly string[]; // index-aligned with parameters
  readonly return_type: string;
  readonly macro_type: MacroType;
};

export type Row = Record<string, unknown>;

export type CoercedParameters = Record<string, JsonValue>;

export type ScalarResult = {
  success: true;
  macro_type: "scalar";
  data: unknown;
  row_count: number;
  execution_time_ms: number;
};

export type TableResult = {
  success: true;
  macro_type: "table";
  data: Row[];
  columns: string[];
  row_count: number;
  execution_time_ms: number;
};

export type ExecutionResult = ScalarResult | TableResult;

export type ExecuteRequest = {
  parameters: Record<string, unknown>;
};

export type ErrorResponse = {
  error: string;
  message: string;
  details?: Record<string, unknown>;
};

export type HealthResponse = {
  ok: boolean;
  database_connected: boolean;
  active_cursors: number;
  macro_count: number;
  uptime_seconds: number;
  version: string;
};

export type MacroExecutionResponse = {
  success: boolean;
  data: unknown;
  columns?: string[];
  row_count: number;
  execution_time_ms: number;
};
