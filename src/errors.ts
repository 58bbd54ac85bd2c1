export type ErrorKind =
  | "not_found"
  | "parameter_error"
  | "execution_error"
  | "database_connection_error"
  | "invalid_identifier"
  | "configuration_error"
  | "invalid_request"
  | "timeout";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every error the bridge raises on purpose.
 *
 * `kind` is stable and safe to branch on; `status` is the HTTP status the
 * error middleware answers with.
 */
export class MacroBridgeError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, status: number, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
    this.details = details;
  }
}

export class MacroNotFoundError extends MacroBridgeError {
  constructor(readonly macroName: string, availableMacros: string[] = []) {
    const details: ErrorDetails = { macro_name: macroName };
    if (availableMacros.length > 0) details.available_macros = availableMacros.slice(0, 10);
    super("not_found", 404, `Macro '${macroName}' not found`, details);
  }
}

export type ParameterErrorContext = {
  parameterName?: string;
  expectedType?: string;
  providedValue?: unknown;
};

export class MacroParameterError extends MacroBridgeError {
  constructor(message: string, context: ParameterErrorContext = {}) {
    const details: ErrorDetails = {};
    if (context.parameterName) details.parameter_name = context.parameterName;
    if (context.expectedType) details.expected_type = context.expectedType;
    if (context.providedValue !== undefined && context.providedValue !== null) {
      details.provided_value =
        typeof context.providedValue === "string" ? context.providedValue : JSON.stringify(context.providedValue);
    }
    super("parameter_error", 400, message, details);
  }
}

export class MacroExecutionError extends MacroBridgeError {
  constructor(readonly macroName: string, readonly originalError: string, query?: string) {
    const details: ErrorDetails = { macro_name: macroName, original_error: originalError };
    if (query) details.query = query;
    super("execution_error", 500, `Failed to execute macro '${macroName}': ${originalError}`, details);
  }
}

export class DatabaseConnectionError extends MacroBridgeError {
  constructor(message = "Database connection failed", cause?: unknown) {
    super("database_connection_error", 503, message, { component: "database" }, { cause });
  }
}

export class InvalidIdentifierError extends MacroBridgeError {
  constructor(identifier: string) {
    super("invalid_identifier", 400, `Invalid identifier: ${JSON.stringify(identifier)}`, { identifier });
  }
}

export class InvalidDatabasePathError extends MacroBridgeError {
  constructor(path: string) {
    super("configuration_error", 500, "Invalid database path", { setting_name: "DATABASE_PATH", path });
  }
}

export class RequestValidationError extends MacroBridgeError {
  constructor(message: string) {
    super("invalid_request", 400, message);
  }
}

export class QueryTimeoutError extends MacroBridgeError {
  constructor(macroName: string, timeoutMs: number) {
    super("timeout", 504, `Macro '${macroName}' did not finish within ${timeoutMs}ms`, {
      macro_name: macroName,
      timeout_ms: timeoutMs,
    });
  }
}
