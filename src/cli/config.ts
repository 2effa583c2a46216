/**
 * Configuration Management
 *
 * Reads the optional per-repository `.readme-synth.json`. Environment
 * variables take precedence over the file.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";

import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";
import { DEFAULT_MAVEN_REPOSITORY } from "../metadata/maven.js";
import { DEFAULT_SAMPLE_GLOBS } from "../metadata/samples.js";
import { DEFAULT_SNIPPET_GLOBS } from "../metadata/snippets.js";

import type { Result } from "../lib/result.js";

export const CONFIG_FILE = ".readme-synth.json";

export const MAVEN_URL_ENV = "README_SYNTH_MAVEN_URL";

/**
 * Configuration schema
 */
const ConfigSchema = z.object({
  mavenRepositoryUrl: z.string().url().optional(),
  sampleGlobs: z.array(z.string().min(1)).min(1).optional(),
  snippetGlobs: z.array(z.string().min(1)).min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  /** README path relative to the repository root */
  output: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration with every default filled in
 */
export interface ResolvedConfig {
  mavenRepositoryUrl: string;
  sampleGlobs: string[];
  snippetGlobs: string[];
  timeoutMs: number;
  output: string;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  mavenRepositoryUrl: DEFAULT_MAVEN_REPOSITORY,
  sampleGlobs: DEFAULT_SAMPLE_GLOBS,
  snippetGlobs: DEFAULT_SNIPPET_GLOBS,
  timeoutMs: 10_000,
  output: "README.md",
};

/**
 * Load `.readme-synth.json` from a repository directory
 *
 * A missing file is an empty config; an unreadable or invalid one is a ConfigError.
 */
export function loadConfig(dir: string): Result<Config, ConfigError> {
  const file = join(dir, CONFIG_FILE);
  if (!existsSync(file)) {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    return err(
      new ConfigError(`Cannot read ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`, {
        filePath: file,
      })
    );
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    return err(
      new ConfigError(`Invalid ${CONFIG_FILE}`, {
        filePath: file,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      })
    );
  }

  return ok(result.data);
}

/**
 * Apply environment overrides and defaults
 */
export function resolveConfig(
  config: Config,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const envUrl = env[MAVEN_URL_ENV];

  return {
    mavenRepositoryUrl:
      envUrl !== undefined && envUrl.length > 0
        ? envUrl
        : config.mavenRepositoryUrl ?? DEFAULT_CONFIG.mavenRepositoryUrl,
    sampleGlobs: config.sampleGlobs ?? DEFAULT_CONFIG.sampleGlobs,
    snippetGlobs: config.snippetGlobs ?? DEFAULT_CONFIG.snippetGlobs,
    timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    output: config.output ?? DEFAULT_CONFIG.output,
  };
}
