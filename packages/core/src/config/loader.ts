import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ConfigError, errorMessage } from "../errors/catalog.js";
import { AppConfigSchema, type AppConfig } from "../schemas/app-config.js";
import { CONFIG_FILENAME } from "./defaults.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  /** Default: config.json under the storage root. */
  configPath?: string;
  rootPath?: string;
}

export function resolveConfigPath(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), CONFIG_FILENAME)
  );
}

async function readConfigFile(configPath: string): Promise<string | null> {
  try {
    return await readFile(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new ConfigError(
      `Cannot read config ${configPath}: ${errorMessage(err)}`,
      { configPath },
      { cause: err },
    );
  }
}

function parseConfig(raw: string | null, configPath: string): AppConfig {
  let json: unknown = {};
  if (raw !== null) {
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(
        `Config ${configPath} is not valid JSON`,
        { configPath },
        { cause: err },
      );
    }
  }

  const result = AppConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config ${configPath}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }
  return result.data;
}

/**
 * Reads config.json from the storage root, filling every missing setting
 * with its default. The filled-in file is written back so the defaults can
 * be edited; an unchanged file is left alone.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<AppConfig> {
  const configPath = resolveConfigPath(options);
  const raw = await readConfigFile(configPath);
  const config = parseConfig(raw, configPath);

  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized, "utf-8");
  }

  return config;
}
