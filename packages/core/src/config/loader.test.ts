import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdir, mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { ConfigError } from "../errors/catalog.js";
import { loadConfig, resolveConfigPath } from "./loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("resolveConfigPath", () => {
  it("prefers an explicit path", () => {
    expect(resolveConfigPath({ configPath: "/etc/idmatch.json", rootPath: "/data" })).toBe(
      "/etc/idmatch.json",
    );
  });

  it("places config.json under the storage root", () => {
    expect(resolveConfigPath({ rootPath: "/data/finder" })).toBe(
      "/data/finder/config.json",
    );
  });
});

describe("loadConfig", () => {
  it("fills every section when the file is missing and writes it out", async () => {
    await withTempDir(async (dir) => {
      const rootPath = join(dir, "root");

      const config = await loadConfig({ rootPath });

      expect(config.scan).toEqual({ extensions: ["tif", "tiff"], batchSize: 1000 });
      expect(config.import.column).toBe("hh_id");
      expect(config.search).toEqual({ threshold: 0.7, pageSize: 500, threads: "auto" });

      const written = JSON.parse(await readFile(join(rootPath, "config.json"), "utf-8"));
      expect(written).toEqual(config);
    });
  });

  it("normalizes extensions and keeps explicit settings", async () => {
    await withTempDir(async (dir) => {
      await writeFile(
        join(dir, "config.json"),
        JSON.stringify({
          scan: { extensions: [".TIF", "png"] },
          import: { column: " household_id " },
          search: { threshold: 0.85, threads: 0 },
        }),
      );

      const config = await loadConfig({ rootPath: dir });

      expect(config.scan.extensions).toEqual(["tif", "png"]);
      expect(config.import.column).toBe("household_id");
      expect(config.search).toEqual({ threshold: 0.85, pageSize: 500, threads: 0 });
    });
  });

  it("leaves a complete file untouched", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await loadConfig({ configPath });
      const first = await readFile(configPath, "utf-8");

      await loadConfig({ configPath });

      expect(await readFile(configPath, "utf-8")).toBe(first);
    });
  });

  it("reports schema violations with the setting path", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ search: { threshold: 0.2 } }));

      const err = await loadConfig({ configPath }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).errorCode).toBe("CONFIG_INVALID");
      expect((err as ConfigError).message).toContain("search.threshold");
      // An invalid file is never overwritten
      expect(JSON.parse(await readFile(configPath, "utf-8"))).toEqual({
        search: { threshold: 0.2 },
      });
    });
  });

  it("reports malformed JSON as a ConfigError", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(
        `Config ${configPath} is not valid JSON`,
      );
    });
  });

  it("reports an unreadable config as a ConfigError", async () => {
    await withTempDir(async (dir) => {
      // A directory where the file should be
      const configPath = join(dir, "config.json");
      await mkdir(configPath);

      await expect(loadConfig({ configPath })).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
