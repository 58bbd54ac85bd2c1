import { env } from "process";

function intFromEnv(name: string, def: number): number {
  const v = env[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : def;
}

function boolFromEnv(name: string, def: boolean): boolean {
  const v = env[name];
  if (!v) return def;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}

export const SERVICE_NAME = "macro-bridge";
export const VERSION = "1.0.0";

export const DATABASE_PATH = env.DATABASE_PATH || "data/database.duckdb";
export const READ_ONLY = boolFromEnv("READ_ONLY", true);
export const MAX_CONNECTIONS = intFromEnv("MAX_CONNECTIONS", 10);
export const CONNECTION_TIMEOUT_MS = intFromEnv("CONNECTION_TIMEOUT_MS", 30_000);
export const QUERY_TIMEOUT_MS = intFromEnv("QUERY_TIMEOUT_MS", 300_000);

export const HOST = env.HOST || "0.0.0.0";
export const PORT = intFromEnv("PORT", 8000);
export const API_PREFIX = env.API_PREFIX || "/api/v1";
export const MAX_REQUEST_BYTES = intFromEnv("MAX_REQUEST_BYTES", 1024 * 1024);
export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();
