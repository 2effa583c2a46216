import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import { dirname, relative, resolve } from "path";

import ora from "ora";

import { logger } from "../../lib/logger.js";
import { ok } from "../../lib/result.js";
import { buildReadmeMetadata, loadReadmeMetadataFile } from "../../metadata/loader.js";
import { renderReadme } from "../../templates/readme.js";
import { loadConfig, resolveConfig, type ResolvedConfig } from "../config.js";
import { formatError, formatMetadataJson, formatRenderSummary } from "../formatters.js";

import type { SynthError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";
import type { ReadmeMetadata } from "../../metadata/schema/index.js";

/**
 * Options shared by the commands that assemble metadata
 */
export interface MetadataCommandOptions {
  /** Read a prebuilt metadata JSON file instead of assembling one */
  metadata?: string;
  offline?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface RenderCommandOptions extends MetadataCommandOptions {
  output?: string;
  stdout?: boolean;
}

/**
 * Apply --verbose / --quiet to the global logger
 */
export function configureLogging(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.quiet) {
    logger.configure({ level: "error" });
  } else if (options.verbose) {
    logger.configure({ level: "debug" });
  }
}

/**
 * Load `.readme-synth.json` with defaults and environment overrides applied
 */
function loadResolvedConfig(repoDir: string): Result<ResolvedConfig, SynthError> {
  const config = loadConfig(repoDir);
  return config.success ? ok(resolveConfig(config.data)) : config;
}

/**
 * Assemble (or read) the metadata record for a repository
 */
async function resolveMetadata(
  repoDir: string,
  config: ResolvedConfig,
  options: MetadataCommandOptions,
  showSpinner: boolean
): Promise<Result<ReadmeMetadata, SynthError>> {
  if (options.metadata) {
    return loadReadmeMetadataFile(resolve(options.metadata));
  }

  const spinner = showSpinner ? ora("Assembling README metadata...").start() : null;
  const result = await buildReadmeMetadata(repoDir, {
    offline: options.offline,
    maven: { repositoryUrl: config.mavenRepositoryUrl, timeoutMs: config.timeoutMs },
    sampleGlobs: config.sampleGlobs,
    snippetGlobs: config.snippetGlobs,
  });

  if (result.success) {
    spinner?.succeed("Metadata assembled");
  } else {
    spinner?.fail("Failed to assemble metadata");
  }
  return result;
}

/**
 * `render [dir]`: write the README for a repository
 *
 * @returns Process exit code
 */
export async function runRender(dir: string | undefined, options: RenderCommandOptions): Promise<number> {
  configureLogging(options);

  const repoDir = resolve(dir ?? process.cwd());
  if (!existsSync(repoDir)) {
    console.error(formatError(new Error(`Directory not found: ${repoDir}`)));
    return 1;
  }

  const config = loadResolvedConfig(repoDir);
  if (!config.success) {
    console.error(formatError(config.error));
    return 1;
  }

  const showSpinner = !options.quiet && !options.stdout;
  const metadata = await resolveMetadata(repoDir, config.data, options, showSpinner);
  if (!metadata.success) {
    console.error(formatError(metadata.error));
    return 1;
  }

  const readme = renderReadme(metadata.data);

  if (options.stdout) {
    process.stdout.write(readme);
    return 0;
  }

  const outputPath = resolve(repoDir, options.output ?? config.data.output);

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, readme, "utf-8");

  if (!options.quiet) {
    console.log(formatRenderSummary(metadata.data, relative(process.cwd(), outputPath) || outputPath));
  }
  return 0;
}

/**
 * `metadata [dir]`: print the assembled metadata record
 */
export async function runMetadata(dir: string | undefined, options: MetadataCommandOptions): Promise<number> {
  configureLogging(options);

  const repoDir = resolve(dir ?? process.cwd());
  const config = loadResolvedConfig(repoDir);
  if (!config.success) {
    console.error(formatError(config.error));
    return 1;
  }

  const metadata = await resolveMetadata(repoDir, config.data, options, false);
  if (!metadata.success) {
    console.error(formatError(metadata.error));
    return 1;
  }

  console.log(formatMetadataJson(metadata.data));
  return 0;
}
