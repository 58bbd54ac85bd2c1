import { RequestValidationError } from "../errors";

export const MAX_PARAMETERS = 50;
export const MAX_VALUE_LENGTH = 10_000;

export function assertParameterMap(v: unknown): asserts v is Record<string, unknown> {
  if (!v || typeof v !== "object" || Array.isArray(v)) {
    throw new RequestValidationError("Invalid parameters: expected a JSON object");
  }
  const entries = Object.entries(v);
  if (entries.length > MAX_PARAMETERS) {
    throw new RequestValidationError(`Too many parameters (max ${MAX_PARAMETERS})`);
  }
  for (const [key, value] of entries) {
    if (key.startsWith("_") || key.startsWith("$")) {
      throw new RequestValidationError(`Parameter name '${key}' is not allowed`);
    }
    if (typeof value === "string" && value.length > MAX_VALUE_LENGTH) {
      throw new RequestValidationError(`Parameter '${key}' value too long`);
    }
  }
}

/** Flattens a parsed query string; blank values are dropped and the last of repeated keys wins. */
export function queryParameters(query: Record<string, unknown>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, raw] of Object.entries(query)) {
    const value: unknown = Array.isArray(raw) ? raw[raw.length - 1] : raw;
    if (typeof value === "string" && value.trim() !== "") params[key] = value;
  }
  return params;
}
