import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".idmatch");
export const CONFIG_FILENAME = "config.json";
export const DEFAULT_DATABASE_FILENAME = "index.db";
