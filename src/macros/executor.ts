import type { BindValue, QueryResult } from "../adapters/db";
import type { ConnectionManager } from "../database/connection";
import { DatabaseConnectionError, MacroExecutionError, MacroNotFoundError } from "../errors";
import { buildMacroStatement, isSafeIdentifier } from "../guards/identifier";
import type { ExecutionResult, MacroDescriptor } from "../types";
import { createLogger, errorMessage } from "../utils/logger";
import type { MacroCatalog } from "./catalog";
import { coerceParameters, normalizeTypeTag } from "./coercion";

const logger = createLogger("executor");

const MISSING_OBJECT = /does not exist/i;

export class MacroExecutor {
  constructor(private catalog: MacroCatalog, private connections: ConnectionManager) {}

  async execute(name: string, rawParams: Record<string, unknown>): Promise<ExecutionResult> {
    const descriptor = isSafeIdentifier(name) ? await this.catalog.getByName(name) : undefined;
    if (!descriptor) throw new MacroNotFoundError(name, this.catalog.names());

    const coerced = coerceParameters(descriptor, rawParams);
    const args: BindValue[] = [];
    descriptor.parameters.forEach((param, i) => {
      if (Object.hasOwn(coerced, param)) args.push(bindForm(coerced[param], descriptor.parameter_types[i]));
    });
    const sql = buildMacroStatement(descriptor.name, descriptor.macro_type, args.length);

    const { result, elapsed } = await this.run(name, sql, args);
    logger.info("macro_executed", { macro: name, type: descriptor.macro_type, durationMs: elapsed });
    return normalize(descriptor, result, elapsed);
  }

  // Times the driver call only, not lookup or coercion.
  private async run(name: string, sql: string, args: BindValue[]): Promise<{ result: QueryResult; elapsed: number }> {
    try {
      return await this.connections.withCursor(async (cursor) => {
        const started = performance.now();
        const result = await cursor.run(sql, args);
        return { result, elapsed: performance.now() - started };
      });
    } catch (err) {
      if (err instanceof DatabaseConnectionError) throw err;
      const message = errorMessage(err);
      logger.error("macro_failed", { macro: name, sql, error: message });
      if (MISSING_OBJECT.test(message)) throw new MacroNotFoundError(name);
      throw new MacroExecutionError(name, message, sql);
    }
  }
}

// A JSON parameter takes its value as JSON text; other structured values bind as LIST or STRUCT.
function bindForm(value: BindValue, tag: string): BindValue {
  if (value !== null && typeof value === "object" && normalizeTypeTag(tag) === "JSON") return JSON.stringify(value);
  return value;
}

function normalize(descriptor: MacroDescriptor, result: QueryResult, elapsed: number): ExecutionResult {
  if (descriptor.macro_type === "table") {
    return {
      success: true,
      macro_type: "table",
      data: result.rows,
      columns: result.columns,
      row_count: result.rows.length,
      execution_time_ms: elapsed,
    };
  }
  const first = result.rows[0];
  const column = result.columns[0];
  const value = first !== undefined && column !== undefined ? first[column] ?? null : null;
  return {
    success: true,
    macro_type: "scalar",
    data: value,
    row_count: value === null ? 0 : 1,
    execution_time_ms: elapsed,
  };
}
