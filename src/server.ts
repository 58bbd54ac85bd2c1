import express from "express";
import { API_PREFIX, MAX_REQUEST_BYTES, QUERY_TIMEOUT_MS, SERVICE_NAME, VERSION } from "./config";
import type { ConnectionManager } from "./database/connection";
import { MacroNotFoundError, QueryTimeoutError, RequestValidationError } from "./errors";
import { assertParameterMap } from "./guards/request";
import { MacroCatalog } from "./macros/catalog";
import { MacroExecutor } from "./macros/executor";
import { MacroRouteSynthesizer, toResponse } from "./macros/routes";
import { errorHandler } from "./middleware/error";
import type { ExecuteRequest, HealthResponse } from "./types";
import { logger } from "./utils/logger";
import { withTimeout } from "./utils/timeout";

export type AppServices = {
  connections: ConnectionManager;
  catalog: MacroCatalog;
  executor: MacroExecutor;
  routes: MacroRouteSynthesizer;
};

export type AppOptions = {
  apiPrefix?: string;
  queryTimeoutMs?: number;
};

/** Wires the catalog, executor and route synthesizer around one connection manager. */
export function buildServices(connections: ConnectionManager, queryTimeoutMs = QUERY_TIMEOUT_MS): AppServices {
  const catalog = new MacroCatalog(connections);
  const executor = new MacroExecutor(catalog, connections);
  const routes = new MacroRouteSynthesizer(executor, queryTimeoutMs);
  return { connections, catalog, executor, routes };
}

// Validations
function parametersFrom(body: unknown): ExecuteRequest["parameters"] {
  if (!body || typeof body !== "object" || Array.isArray(body)) throw new RequestValidationError("Invalid body");
  const parameters: unknown = "parameters" in body ? body.parameters ?? {} : {};
  assertParameterMap(parameters);
  return parameters;
}

const startedAt = Date.now();

export function createApp(services: AppServices, options: AppOptions = {}) {
  const { connections, catalog, executor, routes } = services;
  const prefix = options.apiPrefix ?? API_PREFIX;
  const timeoutMs = options.queryTimeoutMs ?? QUERY_TIMEOUT_MS;

  const app = express();
  app.use(express.json({ limit: MAX_REQUEST_BYTES }));

  app.get("/", (_req, res) => {
    res.json({ message: SERVICE_NAME, version: VERSION, api: prefix });
  });

  app.get("/healthz", async (_req, res, next) => {
    try {
      const connected = await connections.testConnection();
      const health: HealthResponse = {
        ok: connected,
        database_connected: connected,
        active_cursors: connections.activeCount(),
        macro_count: catalog.size,
        uptime_seconds: (Date.now() - startedAt) / 1000,
        version: VERSION,
      };
      res.status(connected ? 200 : 503).json(health);
    } catch (err) {
      next(err);
    }
  });

  app.get(`${prefix}/macros`, async (_req, res, next) => {
    try {
      const macros = await catalog.discover();
      logger.info("macros_listed", { count: macros.length });
      res.json(macros);
    } catch (err) {
      next(err);
    }
  });

  app.get(`${prefix}/macros/:name`, async (req, res, next) => {
    try {
      const macro = await catalog.getByName(req.params.name);
      if (!macro) throw new MacroNotFoundError(req.params.name);
      res.json(macro);
    } catch (err) {
      next(err);
    }
  });

  app.post(`${prefix}/macros/:name/execute`, async (req, res, next) => {
    try {
      const parameters = parametersFrom(req.body ?? {});
      const { name } = req.params;
      const result = await withTimeout(
        executor.execute(name, parameters),
        timeoutMs,
        () => new QueryTimeoutError(name, timeoutMs)
      );
      logger.info("execute_ok", { macro: name, rowCount: result.row_count, durationMs: result.execution_time_ms });
      res.json(toResponse(result));
    } catch (err) {
      next(err);
    }
  });

  app.use(`${prefix}/execute`, routes.router);

  app.use(errorHandler);
  return app;
}
