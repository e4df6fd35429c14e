import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import type Database from "better-sqlite3";
import { scanAndStore, scanDirectory } from "./scan.js";
import { initializeDatabase } from "../storage/index/schema.js";
import { createIndexStore, type IndexStore } from "../storage/index/store.js";
import { ScanError } from "../errors/catalog.js";

const EXTENSIONS = ["tif", "tiff"];

async function touch(path: string): Promise<void> {
  await writeFile(path, "");
}

describe("scanner", () => {
  let dir: string;
  let root: string;
  let db: Database.Database;
  let store: IndexStore;
  const logger = pino({ level: "silent" });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "scanner-test-"));
    root = join(dir, "root");
    await mkdir(join(root, "batch1"), { recursive: true });
    await mkdir(join(root, "batch2", "deep"), { recursive: true });
    await touch(join(root, "HH001_document.tif"));
    await touch(join(root, "batch1", "ABC123-file.TIF"));
    await touch(join(root, "batch1", "document_ABC123.tiff"));
    await touch(join(root, "batch2", "deep", "scan HH002.Tiff"));
    await touch(join(root, "batch2", "notes.txt"));
    await touch(join(root, "batch2", "tif"));
    await touch(join(root, "batch2", "photo.png"));

    db = initializeDatabase(":memory:");
    store = createIndexStore(db);
  });

  afterEach(async () => {
    db.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe("scanDirectory", () => {
    it("finds recognized extensions case-insensitively", async () => {
      const files = await scanDirectory(root, { extensions: EXTENSIONS });
      const names = files.map((f) => f.name).sort();

      expect(names).toEqual([
        "ABC123-file.TIF",
        "HH001_document.tif",
        "document_ABC123.tiff",
        "scan HH002.Tiff",
      ]);
    });

    it("returns absolute paths", async () => {
      const files = await scanDirectory(root, { extensions: EXTENSIONS });
      const hh001 = files.find((f) => f.name === "HH001_document.tif");

      expect(hh001?.path).toBe(join(root, "HH001_document.tif"));
    });

    it("honours a custom extension list", async () => {
      const files = await scanDirectory(root, { extensions: [".PNG"] });
      expect(files.map((f) => f.name)).toEqual(["photo.png"]);
    });

    it("follows symbolic links to directories", async () => {
      const external = join(dir, "external");
      await mkdir(external);
      await touch(join(external, "linked_HH009.tif"));
      await symlink(external, join(root, "linked"), "dir");

      const files = await scanDirectory(root, { extensions: EXTENSIONS });

      expect(files.map((f) => f.path)).toContain(
        join(root, "linked", "linked_HH009.tif"),
      );
    });

    it("throws ScanError for a missing root", async () => {
      const missing = join(dir, "missing");
      await expect(
        scanDirectory(missing, { extensions: EXTENSIONS }),
      ).rejects.toThrow(`Directory does not exist: ${missing}`);
      await expect(
        scanDirectory(missing, { extensions: EXTENSIONS }),
      ).rejects.toBeInstanceOf(ScanError);
    });

    it("throws ScanError when the root is a file", async () => {
      const file = join(root, "HH001_document.tif");
      await expect(
        scanDirectory(file, { extensions: EXTENSIONS }),
      ).rejects.toThrow(`Not a directory: ${file}`);
    });

    it("returns nothing for an empty directory", async () => {
      const empty = join(dir, "empty");
      await mkdir(empty);
      expect(await scanDirectory(empty, { extensions: EXTENSIONS })).toEqual(
        [],
      );
    });
  });

  describe("scanAndStore", () => {
    it("indexes every discovered file", async () => {
      const report = await scanAndStore({ store, logger }, root, {
        extensions: EXTENSIONS,
        now: () => "2026-01-21T10:00:00.000Z",
      });

      expect(report).toEqual({
        root,
        discovered: 4,
        indexed: 4,
        existing: 0,
      });
      expect(store.countFiles()).toBe(4);
      expect(
        store.listFiles().every((f) => f.discoveredAt === "2026-01-21T10:00:00.000Z"),
      ).toBe(true);
    });

    it("is idempotent across repeated scans", async () => {
      await scanAndStore({ store, logger }, root, { extensions: EXTENSIONS });
      const second = await scanAndStore({ store, logger }, root, {
        extensions: EXTENSIONS,
      });

      expect(second.indexed).toBe(0);
      expect(second.existing).toBe(4);
      expect(store.countFiles()).toBe(4);
    });

    it("only counts files added since the last scan", async () => {
      await scanAndStore({ store, logger }, root, { extensions: EXTENSIONS });
      await touch(join(root, "batch1", "HH003.tif"));

      const report = await scanAndStore({ store, logger }, root, {
        extensions: EXTENSIONS,
      });

      expect(report.indexed).toBe(1);
      expect(report.existing).toBe(4);
      expect(store.countFiles()).toBe(5);
    });

    it("reports progress per batch", async () => {
      const onProgress = vi.fn();

      await scanAndStore({ store, logger }, root, {
        extensions: EXTENSIONS,
        batchSize: 3,
        onProgress,
      });

      expect(onProgress.mock.calls).toEqual([
        [3, 4],
        [4, 4],
      ]);
    });

    it("leaves the store untouched when the root is missing", async () => {
      await expect(
        scanAndStore({ store, logger }, join(dir, "missing"), {
          extensions: EXTENSIONS,
        }),
      ).rejects.toBeInstanceOf(ScanError);
      expect(store.countFiles()).toBe(0);
    });
  });
});
