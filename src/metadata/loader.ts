import { readFile } from "fs/promises";
import path from "path";

import { ConfigError, FetchError, ParseError, ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err, tryCatch } from "../lib/result.js";

import { LIBRARIES_BOM, parseDistributionName } from "./coordinates.js";
import { latestMavenVersion, type MavenLookupOptions } from "./maven.js";
import { loadPartials } from "./partials.js";
import { allSamples, DEFAULT_SAMPLE_GLOBS } from "./samples.js";
import {
  DEFAULT_MIN_JAVA_VERSION,
  FALLBACK_VERSION,
  RepoMetadataSchema,
  parseReadmeMetadata,
} from "./schema/index.js";
import { allSnippets, DEFAULT_SNIPPET_GLOBS } from "./snippets.js";

import type { SynthError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { ReadmeMetadata, ReadmeMetadataInput, RepoMetadata } from "./schema/index.js";

const log = logger.child("[metadata]");

export const REPO_METADATA_FILE = ".repo-metadata.json";

/**
 * Options for assembling README metadata from a repository
 */
export interface BuildOptions {
  /** Skip Maven lookups and use the fallback version */
  offline?: boolean;
  maven?: MavenLookupOptions;
  sampleGlobs?: string[];
  snippetGlobs?: string[];
}

/**
 * Read and validate `.repo-metadata.json`
 */
export async function loadRepoMetadata(dir: string): Promise<Result<RepoMetadata, SynthError>> {
  const file = path.join(dir, REPO_METADATA_FILE);

  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (error) {
    return err(
      new ConfigError(`Cannot read ${REPO_METADATA_FILE} in ${dir}`, {
        filePath: file,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }

  const json = tryCatch((): unknown => JSON.parse(content));
  if (!json.success) {
    return err(new ParseError(`Invalid JSON: ${json.error.message}`, file));
  }

  const result = RepoMetadataSchema.safeParse(json.data);
  if (!result.success) {
    return err(
      new ValidationError(`Invalid ${REPO_METADATA_FILE}`, {
        filePath: file,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      })
    );
  }

  return ok(result.data);
}

/**
 * Read a prebuilt metadata record from a JSON file
 */
export async function loadReadmeMetadataFile(file: string): Promise<Result<ReadmeMetadata, SynthError>> {
  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (error) {
    return err(
      new ConfigError(`Cannot read metadata file ${file}`, {
        filePath: file,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }

  const json = tryCatch((): unknown => JSON.parse(content));
  if (!json.success) {
    return err(new ParseError(`Invalid JSON: ${json.error.message}`, file));
  }

  return parseReadmeMetadata(json.data);
}

async function resolveVersion(
  groupId: string,
  artifactId: string,
  options: BuildOptions
): Promise<string> {
  if (options.offline) {
    return FALLBACK_VERSION;
  }

  const version = await latestMavenVersion(groupId, artifactId, options.maven);
  if (version === undefined) {
    log.warn(`no released version found for ${groupId}:${artifactId}, using ${FALLBACK_VERSION}`);
    return FALLBACK_VERSION;
  }

  log.debug(`${groupId}:${artifactId} -> ${version}`);
  return version;
}

/**
 * Assemble the full README metadata record for a library repository
 *
 * @param dir Repository root containing `.repo-metadata.json`
 */
export async function buildReadmeMetadata(
  dir: string,
  options: BuildOptions = {}
): Promise<Result<ReadmeMetadata, SynthError>> {
  const repo = await loadRepoMetadata(dir);
  if (!repo.success) {
    return repo;
  }

  const coordinates = tryCatch(() => parseDistributionName(repo.data.distribution_name));
  if (!coordinates.success) {
    return err(new ValidationError(coordinates.error.message));
  }

  if (options.offline) {
    log.warn(`offline mode: versions default to ${FALLBACK_VERSION}`);
  }

  let latestVersion: string;
  let latestBomVersion: string;
  try {
    [latestVersion, latestBomVersion] = await Promise.all([
      resolveVersion(coordinates.data.groupId, coordinates.data.artifactId, options),
      resolveVersion(LIBRARIES_BOM.groupId, LIBRARIES_BOM.artifactId, options),
    ]);
  } catch (error) {
    if (error instanceof FetchError) {
      return err(error);
    }
    throw error;
  }

  const partials = await loadPartials(dir);
  if (!partials.success) {
    return partials;
  }

  const samples = await allSamples(options.sampleGlobs ?? DEFAULT_SAMPLE_GLOBS, { cwd: dir });
  const snippets = await allSnippets(options.snippetGlobs ?? DEFAULT_SNIPPET_GLOBS, { cwd: dir });

  const record: ReadmeMetadataInput = {
    repo: repo.data,
    latest_version: latestVersion,
    latest_bom_version: latestBomVersion,
    samples,
    partials: partials.data,
    snippets,
    min_java_version: repo.data.min_java_version ?? DEFAULT_MIN_JAVA_VERSION,
  };

  return parseReadmeMetadata(record);
}
