/**
 * rootdrop config [--distributor url] [--admin-token token]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath, type CliConfig } from "../lib/config.js";

interface ConfigOptions {
  distributor?: string;
  adminToken?: string;
}

export async function configCommand(opts: ConfigOptions, path = getConfigPath()): Promise<CliConfig> {
  const config = await loadConfig(path);
  let changed = false;

  if (opts.distributor) {
    config.distributor = opts.distributor.replace(/\/+$/, "");
    changed = true;
  }
  if (opts.adminToken !== undefined) {
    config.adminToken = opts.adminToken;
    changed = true;
  }

  if (changed) {
    await saveConfig(config, path);
    console.log(`Config saved to ${path}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  distributor: ${config.distributor}`);
  console.log(`  adminToken:  ${config.adminToken ? "(set)" : "(none)"}`);
  return config;
}
