import { FetchError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { FALLBACK_VERSION } from "./schema/index.js";

const log = logger.child("[maven]");

/**
 * Maven Central, the default repository for version lookups
 */
export const DEFAULT_MAVEN_REPOSITORY = "https://repo1.maven.org/maven2";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Options for looking up versions in a Maven repository
 */
export interface MavenLookupOptions {
  /** Repository base URL (default: Maven Central) */
  repositoryUrl?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Fetch implementation, injectable for tests */
  fetch?: typeof fetch;
}

const LATEST_VERSION_REGEX = /<versioning>[\s\S]*?<latest>\s*([^<\s]+)\s*<\/latest>[\s\S]*?<\/versioning>/;

/**
 * Parse the latest released version out of a `maven-metadata.xml` document
 *
 * @returns The `<versioning><latest>` text, or undefined when absent
 */
export function versionFromMavenMetadata(metadata: string): string | undefined {
  const match = LATEST_VERSION_REGEX.exec(metadata);
  return match?.[1];
}

/**
 * URL of the `maven-metadata.xml` file for an artifact
 */
export function mavenMetadataUrl(
  groupId: string,
  artifactId: string,
  repositoryUrl: string = DEFAULT_MAVEN_REPOSITORY
): string {
  const base = repositoryUrl.replace(/\/+$/, "");
  const groupPath = groupId.split(".").join("/");
  return `${base}/${groupPath}/${artifactId}/maven-metadata.xml`;
}

/**
 * Find the latest released version of a Maven artifact
 *
 * An artifact the repository does not know (HTTP status >= 400) resolves
 * to {@link FALLBACK_VERSION}. Network failures reject with a FetchError.
 */
export async function latestMavenVersion(
  groupId: string,
  artifactId: string,
  options: MavenLookupOptions = {}
): Promise<string | undefined> {
  const url = mavenMetadataUrl(groupId, artifactId, options.repositoryUrl);
  const fetchFn = options.fetch ?? fetch;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    log.debug(`GET ${url}`);
    const response = await fetchFn(url, { signal: controller.signal });

    if (response.status >= 400) {
      log.debug(`${groupId}:${artifactId} not found (HTTP ${response.status})`);
      return FALLBACK_VERSION;
    }

    return versionFromMavenMetadata(await response.text());
  } catch (error) {
    throw new FetchError(
      `Failed to look up ${groupId}:${artifactId}: ${error instanceof Error ? error.message : String(error)}`,
      url,
      { groupId, artifactId }
    );
  } finally {
    clearTimeout(timeout);
  }
}
