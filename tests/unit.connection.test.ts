import { describe, it, expect, vi } from "vitest";
import type { Cursor, HandleOpener } from "../src/adapters/db";
import { ConnectionManager, validateDatabasePath } from "../src/database/connection";
import { DatabaseConnectionError, InvalidDatabasePathError } from "../src/errors";
import { FakeDatabase, openerFor } from "./helpers/fakeDb";

async function openFake(db = new FakeDatabase()) {
  const manager = await ConnectionManager.open({ path: "data/test.duckdb", readOnly: true }, openerFor(db));
  return { manager, db };
}

describe("validateDatabasePath", () => {
  it("accepts relative paths", () => {
    expect(() => validateDatabasePath("data/app.duckdb")).not.toThrow();
    expect(() => validateDatabasePath(":memory:")).not.toThrow();
    expect(() => validateDatabasePath("data/v1..2.duckdb")).not.toThrow();
  });

  it("rejects parent-directory segments and absolute paths", () => {
    expect(() => validateDatabasePath("../secret.duckdb")).toThrow(InvalidDatabasePathError);
    expect(() => validateDatabasePath("data/../../x.duckdb")).toThrow(InvalidDatabasePathError);
    expect(() => validateDatabasePath("/etc/app.duckdb")).toThrow(InvalidDatabasePathError);
  });
});

describe("ConnectionManager", () => {
  it("refuses to open a traversing path without touching the opener", async () => {
    const opener = vi.fn<HandleOpener>();
    await expect(ConnectionManager.open({ path: "../x.duckdb", readOnly: true }, opener)).rejects.toThrow(
      InvalidDatabasePathError
    );
    expect(opener).not.toHaveBeenCalled();
  });

  it("propagates handle initialization failures", async () => {
    const opener: HandleOpener = async () => {
      throw new Error("IO Error: cannot open file");
    };
    await expect(ConnectionManager.open({ path: "data/x.duckdb", readOnly: true }, opener)).rejects.toThrow(
      "IO Error: cannot open file"
    );
  });

  it("passes the read-only flag to the opener", async () => {
    const db = new FakeDatabase();
    const opener = vi.fn<HandleOpener>(async () => db);
    await ConnectionManager.open({ path: "data/x.duckdb", readOnly: false }, opener);
    expect(opener).toHaveBeenCalledWith("data/x.duckdb", { readOnly: false });
  });

  it("returns the same cursor on repeated acquire within a task", async () => {
    const { manager, db } = await openFake();
    const [a, b] = await Promise.all([manager.acquire(), manager.acquire()]);
    const c = await manager.acquire();
    expect(a).toBe(b);
    expect(a).toBe(c);
    expect(db.cursors).toHaveLength(1);
    expect(manager.activeCount()).toBe(1);
  });

  it("gives concurrent tasks their own cursors", async () => {
    const { manager } = await openFake();
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = () => resolve();
    });
    const seen: Cursor[] = [];
    const task = () =>
      manager.withCursor(async (cursor) => {
        seen.push(cursor);
        await gate;
      });

    const running = Promise.all([task(), task()]);
    await vi.waitFor(() => expect(seen).toHaveLength(2));
    expect(seen[0]).not.toBe(seen[1]);
    expect(manager.activeCount()).toBe(2);

    open();
    await running;
    expect(manager.activeCount()).toBe(0);
  });

  it("shares the enclosing cursor with nested scopes", async () => {
    const { manager, db } = await openFake();
    const same = await manager.withCursor(async (outer) =>
      manager.withCursor(async (inner) => inner === outer)
    );
    expect(same).toBe(true);
    expect(db.cursors).toHaveLength(1);
  });

  it("releases the cursor when the scoped work fails and reuses it", async () => {
    const { manager, db } = await openFake();
    await expect(
      manager.withCursor(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(manager.activeCount()).toBe(0);

    await manager.withCursor((cursor) => cursor.run("SELECT 1"));
    expect(db.cursors).toHaveLength(1);
  });

  it("reports connectivity without throwing", async () => {
    const { manager, db } = await openFake();
    expect(await manager.testConnection()).toBe(true);
    db.failure = new Error("Connection Error: database has been invalidated");
    expect(await manager.testConnection()).toBe(false);
  });

  it("re-initializes a closed handle once before handing out a cursor", async () => {
    const handles = [new FakeDatabase(), new FakeDatabase()];
    let opened = 0;
    const opener = vi.fn<HandleOpener>(async () => handles[opened++]);
    const manager = await ConnectionManager.open({ path: "data/x.duckdb", readOnly: true }, opener);

    await manager.close();
    expect(handles[0].closed).toBe(true);

    await manager.acquire();
    expect(opener).toHaveBeenCalledTimes(2);
    expect(handles[1].cursors).toHaveLength(1);
  });

  it("raises a connection error when re-initialization fails", async () => {
    let calls = 0;
    const opener: HandleOpener = async () => {
      calls += 1;
      if (calls > 1) throw new Error("IO Error: file is locked");
      return new FakeDatabase();
    };
    const manager = await ConnectionManager.open({ path: "data/x.duckdb", readOnly: true }, opener);
    await manager.close();

    await expect(manager.acquire()).rejects.toThrow(DatabaseConnectionError);
    expect(manager.activeCount()).toBe(0);
  });

  it("closes the caller's cursor and the handle", async () => {
    const { manager, db } = await openFake();
    await manager.acquire();
    await manager.close();
    expect(db.cursors[0].closed).toBe(true);
    expect(db.closed).toBe(true);
    expect(manager.activeCount()).toBe(0);
    expect(manager.isOpen()).toBe(false);
  });

  it("closes cleanly when no cursor was ever acquired", async () => {
    const { manager, db } = await openFake();
    await manager.close();
    expect(db.closed).toBe(true);
    expect(db.cursors).toHaveLength(0);
  });
});
