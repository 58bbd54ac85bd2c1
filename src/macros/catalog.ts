import type { ConnectionManager } from "../database/connection";
import { isSafeIdentifier } from "../guards/identifier";
import type { MacroDescriptor, MacroType, Row } from "../types";
import { createLogger } from "../utils/logger";

const logger = createLogger("catalog");

export const UNKNOWN_TYPE = "UNKNOWN";

export const DISCOVERY_SQL = `
  SELECT function_name,
         parameters,
         parameter_types,
         return_type,
         macro_definition,
         function_type
  FROM duckdb_functions()
  WHERE function_type IN ('macro', 'table_macro')
    AND internal = false
  ORDER BY function_name
`;

function stringList(v: unknown): Array<string | null> {
  if (!Array.isArray(v)) return [];
  return v.map((x) => (typeof x === "string" ? x : null));
}

function text(v: unknown): string {
  return typeof v === "string" ? v : "";
}

/**
 * Scalar or table. The catalog's own tag wins; otherwise the definition is
 * sniffed for TABLE/SELECT with quoted literals removed first.
 */
export function classifyMacro(functionType: string, definition: string, returnType: string): MacroType {
  if (functionType === "table_macro") return "table";
  const code = definition.replace(/'(?:[^']|'')*'/g, "''");
  if (/\b(TABLE|SELECT)\b/i.test(code)) return "table";
  if (returnType.toUpperCase().startsWith("TABLE")) return "table";
  return "scalar";
}

/** One `duckdb_functions()` row to a descriptor; `undefined` when the name is not a plain identifier. */
export function parseCatalogRow(row: Row): MacroDescriptor | undefined {
  const name = text(row.function_name);
  if (!isSafeIdentifier(name)) {
    logger.warn("macro_skipped", { name, reason: "name is not a plain identifier" });
    return undefined;
  }
  const parameters = stringList(row.parameters).map((p, i) => p ?? `arg${i}`);
  const declaredTypes = stringList(row.parameter_types);
  const parameter_types = parameters.map((_, i) => declaredTypes[i] ?? UNKNOWN_TYPE);
  const return_type = text(row.return_type) || UNKNOWN_TYPE;

  return Object.freeze({
    name,
    parameters: Object.freeze(parameters),
    parameter_types: Object.freeze(parameter_types),
    return_type,
    macro_type: classifyMacro(text(row.function_type), text(row.macro_definition), return_type),
  });
}

/**
 * Name-keyed view of the database's macros. The map is swapped on every
 * discovery, never edited, so readers always see one complete discovery.
 */
export class MacroCatalog {
  private cache: ReadonlyMap<string, MacroDescriptor> = new Map();

  constructor(private connections: ConnectionManager) {}

  async discover(): Promise<MacroDescriptor[]> {
    const { rows } = await this.connections.withCursor((cursor) => cursor.run(DISCOVERY_SQL));
    const macros: MacroDescriptor[] = [];
    for (const row of rows) {
      const descriptor = parseCatalogRow(row);
      if (descriptor) macros.push(descriptor);
    }
    this.cache = new Map(macros.map((m) => [m.name, m]));
    logger.info("macros_discovered", { count: macros.length });
    return macros;
  }

  async getByName(name: string): Promise<MacroDescriptor | undefined> {
    const hit = this.cache.get(name);
    if (hit) return hit;
    await this.discover();
    return this.cache.get(name);
  }

  async primeCache(): Promise<void> {
    await this.discover();
    logger.info("macro_cache_primed", { count: this.cache.size });
  }

  list(): MacroDescriptor[] {
    return [...this.cache.values()];
  }

  names(): string[] {
    return [...this.cache.keys()];
  }

  get size(): number {
    return this.cache.size;
  }
}
