import * as TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { CONFIG_FILENAME } from "./constants";
import { ConfigError } from "./errors";
import { debug, error as logError } from "./logging";

const FndocConfigSchema = z
  .object({
    /** Only document functions carrying this prefix, shown without it */
    prefix: z.string().min(1, "Prefix cannot be empty").optional(),
    /** Default script for the CLI, relative to the config file */
    script: z.string().min(1, "Script path cannot be empty").optional(),
  })
  .strict();

export type FndocConfig = z.infer<typeof FndocConfigSchema>;

export interface LoadedConfig {
  config: FndocConfig;
  /** Config file path, or null when none was found */
  path: string | null;
}

/** Walk up from `startDir` to the filesystem root looking for fndoc.toml */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    const candidate = path.join(dir, CONFIG_FILENAME);
    if (existsSync(candidate)) return candidate;

    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

function reportConfigErrors(configPath: string, issues: string[]) {
  logError(`Invalid config in ${configPath}:`);
  for (const issue of issues) {
    logError(` - ${issue}`);
  }
}

/**
 * Parse and validate a config file. Relative script paths are resolved
 * against the directory holding the config.
 *
 * @throws ConfigError when the file cannot be read, is not TOML, or fails validation
 */
export function parseConfigFile(configPath: string): FndocConfig {
  let data: unknown;
  try {
    data = TOML.parse(readFileSync(configPath, "utf-8"));
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    const issues = [`(file): ${message}`];
    reportConfigErrors(configPath, issues);
    throw new ConfigError(configPath, issues, cause);
  }

  const parsed = FndocConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    reportConfigErrors(configPath, issues);
    throw new ConfigError(configPath, issues, parsed.error);
  }

  const { script } = parsed.data;
  return {
    ...parsed.data,
    script: script ? path.resolve(path.dirname(configPath), script) : undefined,
  };
}

/** Find and load the nearest config; an absent file yields an empty config */
export function loadConfig(startDir?: string): LoadedConfig {
  const configPath = findConfigFile(startDir);
  if (!configPath) {
    debug(`No ${CONFIG_FILENAME} found`);
    return { config: {}, path: null };
  }

  debug(`Using config ${configPath}`);
  return { config: parseConfigFile(configPath), path: configPath };
}
