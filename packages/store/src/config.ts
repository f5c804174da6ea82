/**
 * Configuration resolution from environment variables
 *
 * Read once at startup; the resulting CatalogConfig is what the backend
 * selector consumes.
 */

import { homedir } from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./observability/logger.js";
import { toIssues } from "./record.js";

export interface LocalBackendConfig {
  backend: "local";
  /** Absolute path to the document file */
  filePath: string;
}

export type RemoteCredentials =
  | { source: "default" }
  | { source: "static"; accessKeyId: string; secretAccessKey: string };

export interface RemoteBackendConfig {
  backend: "remote";
  bucket: string;
  key: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  /** "default" defers to the SDK's credential provider chain */
  credentials: RemoteCredentials;
  maxAttempts: number;
}

export interface CatalogConfig {
  storage: LocalBackendConfig | RemoteBackendConfig;
  /** Seed dataset file; the bundled dataset when unset */
  seedPath?: string;
  instrument: boolean;
  /** Applied to the shared logger by the process entry point, not per store */
  logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

const BooleanString = z
  .enum(["true", "false", "1", "0"], {
    errorMap: () => ({ message: "must be true, false, 1 or 0" }),
  })
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z
  .object({
    CATALOG_STORAGE_BACKEND: z.enum(["local", "remote"]).default("local"),
    CATALOG_DATA_PATH: z.string().default("./data/services.json"),
    CATALOG_SEED_PATH: z.string().optional(),
    CATALOG_REMOTE_BUCKET: z.string().optional(),
    CATALOG_REMOTE_KEY: z.string().default("services.json"),
    CATALOG_REMOTE_REGION: z.string().default("us-east-1"),
    CATALOG_REMOTE_ENDPOINT: z.string().url().optional(),
    CATALOG_REMOTE_FORCE_PATH_STYLE: BooleanString.default("false"),
    CATALOG_REMOTE_ACCESS_KEY_ID: z.string().optional(),
    CATALOG_REMOTE_SECRET_ACCESS_KEY: z.string().optional(),
    CATALOG_REMOTE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(1),
    CATALOG_INSTRUMENT: BooleanString.default("true"),
    CATALOG_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.CATALOG_STORAGE_BACKEND === "remote" && !env.CATALOG_REMOTE_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CATALOG_REMOTE_BUCKET"],
        message: "is required when CATALOG_STORAGE_BACKEND is remote",
      });
    }
    const hasKeyId = env.CATALOG_REMOTE_ACCESS_KEY_ID !== undefined;
    const hasSecret = env.CATALOG_REMOTE_SECRET_ACCESS_KEY !== undefined;
    if (hasKeyId !== hasSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [hasKeyId ? "CATALOG_REMOTE_SECRET_ACCESS_KEY" : "CATALOG_REMOTE_ACCESS_KEY_ID"],
        message: "access key id and secret must be set together",
      });
    }
  });

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~[\\/](.*)$/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  return path.join(homedir(), match[1] ?? "");
}

/**
 * Resolve a configured path to an absolute path
 */
export function resolvePath(input: string): string {
  return path.resolve(expandTilde(input));
}

/**
 * Load configuration from the environment
 * Empty variables count as unset.
 * @throws ConfigError listing every invalid or missing value
 */
export function loadConfig(env: Environment = process.env): CatalogConfig {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (name.startsWith("CATALOG_") && value !== undefined && value.trim() !== "") {
      present[name] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }
  const parsed = result.data;

  const storage: CatalogConfig["storage"] =
    parsed.CATALOG_STORAGE_BACKEND === "remote"
      ? {
          backend: "remote",
          bucket: parsed.CATALOG_REMOTE_BUCKET ?? "",
          key: parsed.CATALOG_REMOTE_KEY,
          region: parsed.CATALOG_REMOTE_REGION,
          endpoint: parsed.CATALOG_REMOTE_ENDPOINT,
          forcePathStyle: parsed.CATALOG_REMOTE_FORCE_PATH_STYLE,
          credentials:
            parsed.CATALOG_REMOTE_ACCESS_KEY_ID !== undefined &&
            parsed.CATALOG_REMOTE_SECRET_ACCESS_KEY !== undefined
              ? {
                  source: "static",
                  accessKeyId: parsed.CATALOG_REMOTE_ACCESS_KEY_ID,
                  secretAccessKey: parsed.CATALOG_REMOTE_SECRET_ACCESS_KEY,
                }
              : { source: "default" },
          maxAttempts: parsed.CATALOG_REMOTE_MAX_ATTEMPTS,
        }
      : {
          backend: "local",
          filePath: resolvePath(parsed.CATALOG_DATA_PATH),
        };

  return {
    storage,
    seedPath: parsed.CATALOG_SEED_PATH ? resolvePath(parsed.CATALOG_SEED_PATH) : undefined,
    instrument: parsed.CATALOG_INSTRUMENT,
    logLevel: parsed.CATALOG_LOG_LEVEL,
  };
}
