import { readFile } from "fs/promises";
import path from "path";

import { glob } from "glob";
import YAML from "yaml";

import { logger } from "../lib/logger.js";

import type { Sample } from "./schema/index.js";

const log = logger.child("[samples]");

/**
 * Where Java samples live in a client library repository
 */
export const DEFAULT_SAMPLE_GLOBS = ["samples/**/src/main/java/**/*.java"];

/**
 * A `// sample-metadata:` comment block and its continuation lines
 */
const SAMPLE_METADATA_REGEX = /\/\/ *sample-metadata:(?:[^\n]+|\n[ \t]*\/\/)+/;
const COMMENT_PREFIX_REGEX = /^[ \t]*\/\/ ?/gm;

/**
 * Turn a camel-cased name into words: `fooBar` -> `Foo Bar`, `ACLBatman` -> `ACL Batman`
 */
export function decamelize(value: string): string {
  if (value.length === 0) {
    return "";
  }

  const capitalized = value.charAt(0).toUpperCase() + value.slice(1);
  return capitalized
    .replace(/([A-Z]+)([A-Z])([a-z0-9])/g, "$1 $2$3")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2");
}

/**
 * Read the YAML embedded in a `// sample-metadata:` comment
 *
 * @example
 * ```java
 * // sample-metadata:
 * //   title: Create a bucket
 * ```
 *
 * @returns The mapping under `sample-metadata`, or `{}` when absent or malformed
 */
export function readSampleMetadataComment(
  contents: string,
  file = "<inline>"
): Record<string, unknown> {
  const match = SAMPLE_METADATA_REGEX.exec(contents);
  if (!match) {
    return {};
  }

  const yamlText = match[0].replace(COMMENT_PREFIX_REGEX, "");

  let parsed: unknown;
  try {
    parsed = YAML.parse(yamlText);
  } catch (error) {
    log.warn(`bad sample metadata in ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }

  if (!isRecord(parsed)) {
    return {};
  }

  const metadata = parsed["sample-metadata"];
  return isRecord(metadata) ? metadata : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a sample entry for one source file
 */
export function sampleFromSource(file: string, contents: string): Sample {
  const metadata = readSampleMetadataComment(contents, file);
  const title = metadata["title"];

  if (typeof title === "string" && title.trim().length > 0) {
    return { title: title.trim(), file };
  }

  const baseName = path.posix.basename(file).split(".")[0] ?? "";
  return { title: decamelize(baseName) || file, file };
}

/**
 * Options for sample discovery
 */
export interface DiscoveryOptions {
  /** Directory the globs are resolved against (default: process.cwd()) */
  cwd?: string;
}

/**
 * Expand globs to repository-relative, POSIX-style file paths, sorted
 */
export async function expandGlobs(globs: string[], options: DiscoveryOptions = {}): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const files = new Set<string>();

  for (const pattern of globs) {
    const matches = await glob(pattern, { cwd, nodir: true, posix: true });
    for (const match of matches) {
      files.add(match);
    }
  }

  return [...files].sort();
}

/**
 * Discover all samples matching the globs
 *
 * Samples are ordered by file path so the README table is stable.
 */
export async function allSamples(globs: string[], options: DiscoveryOptions = {}): Promise<Sample[]> {
  const cwd = options.cwd ?? process.cwd();
  const files = await expandGlobs(globs, { cwd });
  const samples: Sample[] = [];

  for (const file of files) {
    const contents = await readFile(path.join(cwd, file), "utf-8");
    samples.push(sampleFromSource(file, contents));
  }

  log.debug(`found ${samples.length} samples`);
  return samples;
}
