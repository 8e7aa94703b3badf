import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  CorruptLocalStateError,
  InvalidScriptNameError,
  ScriptNotCachedError,
  SyncAlreadyInProgressError,
} from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";
import { createInventoryPaths, type InventoryPaths } from "../core/paths.js";

import { SyncLock } from "./lock.js";
import { LocalInventoryStore } from "./store.js";

describe("LocalInventoryStore", () => {
  let root: string;
  let paths: InventoryPaths;
  let store: LocalInventoryStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "inventory-store-"));
    paths = createInventoryPaths(root);
    store = new LocalInventoryStore(paths);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("returns an empty record when nothing is stored", async () => {
    await expect(store.load()).resolves.toEqual({ entries: {}, revision: null, lastSyncedAt: null });
    await expect(store.loadPointer()).resolves.toBeNull();
  });

  it("round-trips the record with its revision", async () => {
    const record = {
      entries: {
        weather: {
          script_name: "weather",
          document_id: "",
          created_at: "2024-05-01T10:00:00Z",
          updated_at: "2024-05-01T10:00:00Z",
          tags: ["http"],
        },
      },
      revision: "rev-3",
      lastSyncedAt: "2024-05-01T11:00:00Z",
    };

    await store.save(record);

    await expect(store.load()).resolves.toEqual(record);
    const leftovers = fs.readdirSync(root).filter((name) => name.endsWith(".tmp"));
    expect(leftovers).toEqual([]);
  });

  it("keeps the mapping file in place while saves replace it", async () => {
    const recordAt = (revision: number) => ({
      entries: {
        weather: {
          script_name: "weather",
          document_id: "g-weather",
          created_at: "2024-05-01T10:00:00Z",
          updated_at: "2024-05-01T10:00:00Z",
          tags: [],
        },
      },
      revision: `rev-${revision}`,
      lastSyncedAt: "2024-05-01T11:00:00Z",
    });
    await store.save(recordAt(0));

    let saving = true;
    const saves = (async () => {
      for (let revision = 1; revision <= 100; revision += 1) {
        await store.save(recordAt(revision));
      }
      saving = false;
    })();

    let missing = 0;
    let empty = 0;
    const reads = (async () => {
      while (saving) {
        if (!fs.existsSync(paths.mappingFile)) missing += 1;
        const loaded = await store.load();
        if (Object.keys(loaded.entries).length === 0) empty += 1;
      }
    })();
    await Promise.all([saves, reads]);

    expect({ missing, empty }).toEqual({ missing: 0, empty: 0 });
    await expect(store.load()).resolves.toEqual(recordAt(100));
  });

  it("refuses to reset a mapping file that is not JSON", async () => {
    fs.writeFileSync(paths.mappingFile, "{ broken", "utf8");

    await expect(store.load()).rejects.toBeInstanceOf(CorruptLocalStateError);
    expect(fs.readFileSync(paths.mappingFile, "utf8")).toBe("{ broken");
  });

  it("refuses a mapping file that fails validation", async () => {
    fs.writeFileSync(paths.mappingFile, JSON.stringify({ entries: { "a/b": {} } }), "utf8");

    const error = await store.load().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CorruptLocalStateError);
    if (error instanceof CorruptLocalStateError) {
      expect(error.filePath).toBe(paths.mappingFile);
    }
  });

  it("stores and validates the pointer", async () => {
    const pointer = { document_id: "g-1", owner: "octo", updated_at: "2024-05-01T10:00:00Z" };

    await store.savePointer(pointer);
    await expect(store.loadPointer()).resolves.toEqual(pointer);

    fs.writeFileSync(paths.pointerFile, JSON.stringify({ document_id: "" }), "utf8");
    await expect(store.loadPointer()).rejects.toBeInstanceOf(CorruptLocalStateError);
  });

  it("caches, reads and removes script bodies", async () => {
    const filePath = await store.cacheScript("weather", "print(1)\n");

    expect(filePath).toBe(path.join(root, "scripts", "weather.py"));
    await expect(store.readCachedScript("weather")).resolves.toBe("print(1)\n");
    await expect(store.hasCachedScript("weather")).resolves.toBe(true);

    await store.removeCachedScript("weather");
    await expect(store.readCachedScript("weather")).rejects.toBeInstanceOf(ScriptNotCachedError);
    await expect(store.hasCachedScript("weather")).resolves.toBe(false);
  });

  it("rejects names that would escape the scripts directory", () => {
    expect(() => store.cachedScriptPath("../config")).toThrow(InvalidScriptNameError);
  });
});

describe("SyncLock", () => {
  let root: string;
  let lockPath: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "inventory-lock-"));
    lockPath = path.join(root, "sync.lock");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("fails fast while another holder has a fresh lock", async () => {
    const logger = new MemoryLogger();
    const first = new SyncLock({ lockPath, logger });
    const second = new SyncLock({ lockPath, logger });

    await first.acquire();
    await expect(second.acquire()).rejects.toBeInstanceOf(SyncAlreadyInProgressError);

    await first.release();
    await second.acquire();
    expect(second.isHeld).toBe(true);
    await second.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("reclaims a stale lock and logs a warning", async () => {
    fs.writeFileSync(
      lockPath,
      JSON.stringify({ pid: 4242, acquired_at: "2024-05-01T10:00:00Z" }),
      "utf8",
    );
    const logger = new MemoryLogger();
    const lock = new SyncLock({
      lockPath,
      logger,
      staleAfterMs: 60_000,
      now: () => new Date("2024-05-01T10:05:00Z"),
    });

    await lock.acquire();

    expect(logger.ofType("lock.stale_reclaimed")).toEqual([
      {
        type: "lock.stale_reclaimed",
        level: "warn",
        payload: { lock_path: lockPath, holder_pid: 4242, acquired_at: "2024-05-01T10:00:00Z" },
      },
    ]);
    expect(JSON.parse(fs.readFileSync(lockPath, "utf8"))).toEqual({
      pid: process.pid,
      acquired_at: "2024-05-01T10:05:00Z",
    });
    await lock.release();
  });

  it("releases the lock when the guarded work throws", async () => {
    const lock = new SyncLock({ lockPath, logger: new MemoryLogger() });

    await expect(
      lock.withLock(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(fs.existsSync(lockPath)).toBe(false);
    await lock.release();
  });
});
