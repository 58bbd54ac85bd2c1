import { AsyncLocalStorage } from "async_hooks";
import { openDuckDB } from "../adapters/duckdb";
import type { Cursor, DatabaseHandle, HandleOpener } from "../adapters/db";
import { DatabaseConnectionError, InvalidDatabasePathError } from "../errors";
import { createLogger, errorMessage } from "../utils/logger";

const logger = createLogger("connection");

const MAIN_TASK = "main";
const DEFAULT_MAX_CONNECTIONS = 10;

export type ConnectionOptions = {
  path: string;
  readOnly: boolean;
  /** Upper bound on idle cursors kept for reuse. */
  maxConnections?: number;
};

export function validateDatabasePath(path: string): void {
  const segments = path.split(/[\\/]/);
  if (segments.includes("..") || path.startsWith("/") || path.startsWith("\\")) {
    throw new InvalidDatabasePathError(path);
  }
}

/**
 * Owns the process-wide database handle and hands out one cursor per task.
 *
 * A task is the async context opened by {@link withCursor}; code running
 * outside any such context shares the main task. Counter and map updates
 * all happen synchronously, so no lock is needed on the event loop.
 */
export class ConnectionManager {
  private handle: DatabaseHandle | null = null;
  private opening: Promise<DatabaseHandle> | null = null;
  private readonly cursors = new Map<string, Promise<Cursor>>();
  private readonly idle: Cursor[] = [];
  private readonly tasks = new AsyncLocalStorage<string>();
  private readonly maxConnections: number;
  private taskSeq = 0;
  private active = 0;

  private constructor(readonly path: string, readonly readOnly: boolean, maxConnections: number, private opener: HandleOpener) {
    validateDatabasePath(path);
    this.maxConnections = maxConnections;
  }

  static async open(options: ConnectionOptions, opener: HandleOpener = openDuckDB): Promise<ConnectionManager> {
    const manager = new ConnectionManager(
      options.path,
      options.readOnly,
      options.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
      opener
    );
    await manager.initHandle();
    return manager;
  }

  isOpen(): boolean {
    return this.handle !== null;
  }

  private async initHandle(): Promise<DatabaseHandle> {
    if (this.handle) return this.handle;
    this.opening ??= this.openHandle();
    try {
      return await this.opening;
    } finally {
      this.opening = null;
    }
  }

  private async openHandle(): Promise<DatabaseHandle> {
    try {
      const handle = await this.opener(this.path, { readOnly: this.readOnly });
      this.handle = handle;
      logger.info("connection_initialized", { path: this.path, readOnly: this.readOnly });
      return handle;
    } catch (err) {
      logger.error("connection_init_failed", { path: this.path, error: errorMessage(err) });
      throw err;
    }
  }

  private currentTask(): string {
    return this.tasks.getStore() ?? MAIN_TASK;
  }

  /** The calling task's cursor, created on first use. */
  async acquire(): Promise<Cursor> {
    const task = this.currentTask();
    const existing = this.cursors.get(task);
    if (existing) return existing;

    const pending = this.createCursor();
    this.cursors.set(task, pending);
    this.active += 1;
    try {
      return await pending;
    } catch (err) {
      this.cursors.delete(task);
      this.active -= 1;
      throw err;
    }
  }

  private async createCursor(): Promise<Cursor> {
    const reused = this.idle.pop();
    if (reused) return reused;

    let handle = this.handle;
    if (!handle) {
      try {
        handle = await this.initHandle();
      } catch (err) {
        throw new DatabaseConnectionError("Failed to initialize database connection", err);
      }
    }
    try {
      const cursor = await handle.connect();
      logger.debug("cursor_created", { task: this.currentTask() });
      return cursor;
    } catch (err) {
      throw new DatabaseConnectionError(`Failed to open cursor: ${errorMessage(err)}`, err);
    }
  }

  /** Gives the calling task's cursor back; idle cursors are reused up to `maxConnections`. */
  async release(): Promise<void> {
    const task = this.currentTask();
    const pending = this.cursors.get(task);
    if (!pending) return;
    this.cursors.delete(task);
    this.active = Math.max(0, this.active - 1);

    const cursor = await pending;
    if (this.handle && this.idle.length < this.maxConnections) {
      this.idle.push(cursor);
    } else {
      this.closeCursor(cursor);
    }
  }

  /**
   * Runs `fn` as its own task with a cursor that is released on every exit
   * path. Nested calls share the enclosing task's cursor.
   */
  async withCursor<T>(fn: (cursor: Cursor) => Promise<T>): Promise<T> {
    if (this.tasks.getStore() !== undefined) {
      return fn(await this.acquire());
    }
    this.taskSeq += 1;
    return this.tasks.run(`task-${this.taskSeq}`, async () => {
      const cursor = await this.acquire();
      try {
        return await fn(cursor);
      } finally {
        await this.release();
      }
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.withCursor((cursor) => cursor.run("SELECT 1"));
      return true;
    } catch (err) {
      logger.error("connection_test_failed", { error: errorMessage(err) });
      return false;
    }
  }

  activeCount(): number {
    return this.active;
  }

  async close(): Promise<void> {
    const own = this.cursors.get(this.currentTask());
    if (own) {
      this.cursors.delete(this.currentTask());
      this.closeCursor(await own);
    }
    for (const cursor of this.idle.splice(0)) this.closeCursor(cursor);
    this.cursors.clear();
    this.active = 0;

    if (this.handle) {
      this.handle.close();
      this.handle = null;
    }
    logger.info("connections_closed", { path: this.path });
  }

  private closeCursor(cursor: Cursor): void {
    try {
      cursor.close();
    } catch (err) {
      logger.warn("cursor_close_failed", { error: errorMessage(err) });
    }
  }
}
