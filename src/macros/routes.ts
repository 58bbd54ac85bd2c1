import { Router, type RequestHandler } from "express";
import { QueryTimeoutError } from "../errors";
import { assertParameterMap, queryParameters } from "../guards/request";
import type { ExecutionResult, MacroDescriptor, MacroExecutionResponse, MacroType } from "../types";
import { createLogger } from "../utils/logger";
import { withTimeout } from "../utils/timeout";
import type { MacroCatalog } from "./catalog";
import type { MacroExecutor } from "./executor";

const logger = createLogger("routes");

export type RouteEntry = {
  method: "GET" | "POST";
  path: string;
  macro: string;
  macro_type: MacroType;
  /** Where the handler reads its raw parameters from. */
  source: "query" | "body";
};

export function toResponse(result: ExecutionResult): MacroExecutionResponse {
  const response: MacroExecutionResponse = {
    success: result.success,
    data: result.data,
    row_count: result.row_count,
    execution_time_ms: result.execution_time_ms,
  };
  if (result.macro_type === "table") response.columns = result.columns;
  return response;
}

/**
 * Turns discovered macros into express routes. Every route is one entry of
 * a dispatch table bound to the same handler; nothing is generated per macro
 * except that entry.
 */
export class MacroRouteSynthesizer {
  readonly router = Router({ caseSensitive: true });
  private readonly registered = new Set<string>();
  private readonly table: RouteEntry[] = [];

  constructor(private executor: MacroExecutor, private timeoutMs = 0) {}

  /** Adds routes for macros seen for the first time; safe to call repeatedly. */
  async generateAll(catalog: MacroCatalog): Promise<RouteEntry[]> {
    const macros = await catalog.discover();
    for (const macro of macros) {
      if (this.registered.has(macro.name)) continue;
      this.register(macro);
      this.registered.add(macro.name);
      logger.info("route_generated", { macro: macro.name, type: macro.macro_type });
    }
    logger.info("routes_generated", { macros: this.registered.size, routes: this.table.length });
    return this.routes();
  }

  routes(): RouteEntry[] {
    return [...this.table];
  }

  private register(macro: MacroDescriptor): void {
    const path = `/${macro.name}`;
    this.add({ method: "GET", path, macro: macro.name, macro_type: macro.macro_type, source: "query" });
    if (macro.macro_type === "table") {
      this.add({ method: "POST", path, macro: macro.name, macro_type: macro.macro_type, source: "body" });
    }
  }

  private add(entry: RouteEntry): void {
    this.table.push(entry);
    if (entry.method === "GET") this.router.get(entry.path, this.dispatch(entry));
    else this.router.post(entry.path, this.dispatch(entry));
  }

  private dispatch(entry: RouteEntry): RequestHandler {
    return async (req, res, next) => {
      try {
        const params: unknown = entry.source === "query" ? queryParameters(req.query) : req.body ?? {};
        assertParameterMap(params);
        const result = await withTimeout(
          this.executor.execute(entry.macro, params),
          this.timeoutMs,
          () => new QueryTimeoutError(entry.macro, this.timeoutMs)
        );
        res.json(toResponse(result));
      } catch (err) {
        next(err);
      }
    };
  }
}
