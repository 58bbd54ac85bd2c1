import { MacroParameterError } from "../errors";
import type { CoercedParameters, JsonValue, MacroDescriptor } from "../types";
import { createLogger } from "../utils/logger";

const logger = createLogger("coercion");

export type TypeFamily = "integer" | "float" | "string" | "boolean" | "datetime" | "json" | "unknown";

const FAMILIES = new Map<string, TypeFamily>([
  ["INTEGER", "integer"],
  ["BIGINT", "integer"],
  ["INT", "integer"],
  ["SMALLINT", "integer"],
  ["TINYINT", "integer"],
  ["DOUBLE", "float"],
  ["REAL", "float"],
  ["FLOAT", "float"],
  ["DECIMAL", "float"],
  ["NUMERIC", "float"],
  ["VARCHAR", "string"],
  ["TEXT", "string"],
  ["STRING", "string"],
  ["CHAR", "string"],
  ["BOOLEAN", "boolean"],
  ["DATE", "datetime"],
  ["TIMESTAMP", "datetime"],
  ["TIME", "datetime"],
  ["JSON", "json"],
  ["ARRAY", "json"],
]);

const NUMBER_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_TEXT = /^-?\d+$/;
const DATE_TEXT = /^(\d{4}-\d{2}-\d{2}|\d{1,2}\/\d{1,2}\/\d{4})$/;
const NULL_TOKENS = new Set(["", "null", "none"]);
const TRUE_TOKENS = new Set(["true", "1", "yes", "on", "t", "y"]);
const FALSE_TOKENS = new Set(["false", "0", "no", "off", "f", "n"]);

class ConversionError extends Error {}

/** `decimal(18, 3)` -> `DECIMAL` */
export function normalizeTypeTag(tag: string): string {
  return tag.trim().toUpperCase().replace(/\s*\(.*\)$/, "");
}

export function typeFamily(tag: string): TypeFamily {
  const normalized = normalizeTypeTag(tag);
  if (normalized.endsWith("[]")) return "json";
  return FAMILIES.get(normalized) ?? "unknown";
}

export function isJsonValue(v: unknown): v is JsonValue {
  if (v === null || typeof v === "string" || typeof v === "boolean") return true;
  if (typeof v === "number") return Number.isFinite(v);
  if (Array.isArray(v)) return v.every(isJsonValue);
  if (typeof v === "object") {
    const proto = Object.getPrototypeOf(v);
    return (proto === Object.prototype || proto === null) && Object.values(v).every(isJsonValue);
  }
  return false;
}

function describe(value: unknown): string {
  return typeof value === "string" ? `'${value}'` : JSON.stringify(value) ?? String(value);
}

function toNumber(value: unknown, tag: string): number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ConversionError(`Cannot convert ${value} to ${tag}`);
    return value;
  }
  if (typeof value !== "string") throw new ConversionError(`Cannot convert ${describe(value)} to ${tag}`);

  const trimmed = value.trim();
  if (NULL_TOKENS.has(trimmed.toLowerCase())) return null;
  const n = Number(trimmed);
  if (!NUMBER_TEXT.test(trimmed) || !Number.isFinite(n)) {
    throw new ConversionError(`Cannot convert ${describe(value)} to ${tag}`);
  }
  return n;
}

function toBoolean(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string" || typeof value === "number") {
    const token = String(value).trim().toLowerCase();
    if (TRUE_TOKENS.has(token)) return true;
    if (FALSE_TOKENS.has(token)) return false;
  }
  throw new ConversionError(`Cannot convert ${describe(value)} to boolean`);
}

function toDateText(value: unknown, tag: string): string | null {
  if (typeof value !== "string" && typeof value !== "number") {
    throw new ConversionError(`Cannot convert ${describe(value)} to ${tag}`);
  }
  const text = String(value).trim();
  if (NULL_TOKENS.has(text.toLowerCase())) return null;
  if (tag === "DATE" && !DATE_TEXT.test(text)) {
    throw new ConversionError(`Invalid date format: ${text}. Expected YYYY-MM-DD or MM/DD/YYYY`);
  }
  // the engine parses the text itself
  return text;
}

function toJson(value: unknown): JsonValue {
  if (typeof value === "string") {
    try {
      const parsed: JsonValue = JSON.parse(value);
      return parsed;
    } catch {
      throw new ConversionError(`Invalid JSON format: ${value}`);
    }
  }
  if (isJsonValue(value)) return value;
  throw new ConversionError(`Cannot convert ${describe(value)} to JSON`);
}

function sniff(value: unknown, tag: string): JsonValue {
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (INTEGER_TEXT.test(trimmed)) {
      const n = Number(trimmed);
      // out-of-range integers stay text and are cast by the engine
      if (Number.isSafeInteger(n)) return n;
    } else if (NUMBER_TEXT.test(trimmed)) {
      return Number(trimmed);
    }
  }
  logger.warn("unknown_parameter_type", { type: tag, note: "passing value as-is" });
  if (isJsonValue(value)) return value;
  throw new ConversionError(`Cannot pass ${describe(value)} as ${tag}`);
}

/**
 * Converts one untyped value to what a parameter declared as `tag` expects.
 * Blank strings are null whatever the type.
 */
export function coerceValue(value: unknown, tag: string): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && value.trim() === "") return null;

  const normalized = normalizeTypeTag(tag || "UNKNOWN");
  switch (typeFamily(normalized)) {
    case "integer": {
      const n = toNumber(value, normalized);
      if (n === null) return null;
      const truncated = Math.trunc(n);
      return truncated === 0 ? 0 : truncated;
    }
    case "float":
      return toNumber(value, normalized);
    case "string":
      return typeof value === "object" ? JSON.stringify(value) : String(value);
    case "boolean":
      return toBoolean(value);
    case "datetime":
      return toDateText(value, normalized);
    case "json":
      return toJson(value);
    case "unknown":
      return sniff(value, normalized);
  }
}

/**
 * Checks a raw parameter map against a macro's declaration and coerces every
 * supplied value.
 *
 * Arguments bind by position, so a declared parameter may only be left out
 * when no later one is supplied.
 */
export function coerceParameters(descriptor: MacroDescriptor, raw: Record<string, unknown>): CoercedParameters {
  const supplied = Object.entries(raw).filter(([, v]) => v !== null && v !== undefined);
  const expected = descriptor.parameters.length;
  if (supplied.length > expected) {
    throw new MacroParameterError(`Too many parameters. Expected ${expected}, got ${supplied.length}`);
  }
  for (const [key, value] of supplied) {
    if (!descriptor.parameters.includes(key)) {
      throw new MacroParameterError(`Unknown parameter '${key}' for macro '${descriptor.name}'`, {
        parameterName: key,
        providedValue: value,
      });
    }
  }

  const coerced: CoercedParameters = {};
  let missing: { name: string; type: string } | undefined;
  descriptor.parameters.forEach((name, i) => {
    const type = descriptor.parameter_types[i];
    const value = Object.hasOwn(raw, name) ? raw[name] : undefined;
    if (value === null || value === undefined) {
      missing ??= { name, type };
      return;
    }
    if (missing) {
      throw new MacroParameterError(`Missing parameter '${missing.name}' which must precede '${name}'`, {
        parameterName: missing.name,
        expectedType: missing.type,
      });
    }
    try {
      coerced[name] = coerceValue(value, type);
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err;
      throw new MacroParameterError(`Invalid value for parameter '${name}': ${err.message}`, {
        parameterName: name,
        expectedType: type,
        providedValue: value,
      });
    }
  });
  return coerced;
}
