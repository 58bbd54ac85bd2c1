import { InvalidIdentifierError } from "../errors";
import type { MacroType } from "../types";

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

export function assertIdentifier(name: string): void {
  if (!isSafeIdentifier(name)) throw new InvalidIdentifierError(name);
}

/**
 * Statement text for calling a macro with `argCount` bound arguments.
 * The name is the only part embedded in the text; values always go through `?`.
 */
export function buildMacroStatement(name: string, macroType: MacroType, argCount: number): string {
  assertIdentifier(name);
  const placeholders = Array.from({ length: argCount }, () => "?").join(",");
  const call = `${name}(${placeholders})`;
  return macroType === "table" ? `SELECT * FROM ${call}` : `SELECT ${call}`;
}
