/**
 * CLI configuration: loads from ~/.rootdrop/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

export interface CliConfig {
  /** Distributor service base URL. */
  distributor: string;
  /** Bearer token for /seed and /owner/*. Empty = not configured. */
  adminToken: string;
}

const CONFIG_FILE = join(homedir(), ".rootdrop", "config.json");

const DEFAULT_DISTRIBUTOR = "http://localhost:3200";

export function getConfigPath(): string {
  return CONFIG_FILE;
}

type FileConfig = Partial<CliConfig>;

async function readFileConfig(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    // No config file yet: use defaults
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`${path}: expected a JSON object`);
  }
  const out: FileConfig = {};
  if ("distributor" in parsed && typeof parsed.distributor === "string") out.distributor = parsed.distributor;
  if ("adminToken" in parsed && typeof parsed.adminToken === "string") out.adminToken = parsed.adminToken;
  return out;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(path = CONFIG_FILE): Promise<CliConfig> {
  const fileConfig = await readFileConfig(path);
  return {
    distributor: process.env["ROOTDROP_DISTRIBUTOR"] || fileConfig.distributor || DEFAULT_DISTRIBUTOR,
    adminToken: process.env["ROOTDROP_ADMIN_TOKEN"] || fileConfig.adminToken || "",
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig, path = CONFIG_FILE): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const toSave = {
    distributor: config.distributor,
    ...(config.adminToken ? { adminToken: config.adminToken } : {}),
  };
  await writeFile(path, JSON.stringify(toSave, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
}
