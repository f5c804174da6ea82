/**
 * Environment and configuration resolution
 */

import type { Environment } from "@service-catalog/store";

/**
 * Global CLI options that override configuration variables
 */
export type GlobalOptions = {
  backend?: "local" | "remote";
  path?: string;
  bucket?: string;
  key?: string;
  seed?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type OverrideOption = "backend" | "path" | "bucket" | "key" | "seed";

const OVERRIDES: ReadonlyArray<readonly [OverrideOption, string]> = [
  ["backend", "CATALOG_STORAGE_BACKEND"],
  ["path", "CATALOG_DATA_PATH"],
  ["bucket", "CATALOG_REMOTE_BUCKET"],
  ["key", "CATALOG_REMOTE_KEY"],
  ["seed", "CATALOG_SEED_PATH"],
];

/**
 * Apply CLI options over the process environment
 * Priority: CLI option > environment variable > built-in default
 */
export function resolveEnvironment(options: GlobalOptions, env: Environment): Environment {
  const resolved: Environment = { ...env };
  for (const [option, variable] of OVERRIDES) {
    const value = options[option];
    if (value !== undefined) {
      resolved[variable] = value;
    }
  }
  return resolved;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(options: GlobalOptions, env: Environment): boolean {
  return options.verbose === true || env.CATALOG_CLI_DEBUG === "1";
}
