import { ValidationError } from "../lib/errors.js";

/**
 * Maven coordinates of a library
 */
export interface MavenCoordinates {
  groupId: string;
  artifactId: string;
}

/**
 * Coordinates of the Google Cloud libraries BOM
 */
export const LIBRARIES_BOM: MavenCoordinates = {
  groupId: "com.google.cloud",
  artifactId: "libraries-bom",
};

/**
 * Split a "group:artifact" distribution name into Maven coordinates
 *
 * @example
 * ```typescript
 * parseDistributionName("com.google.cloud:google-cloud-foo");
 * // { groupId: "com.google.cloud", artifactId: "google-cloud-foo" }
 * ```
 */
export function parseDistributionName(distributionName: string): MavenCoordinates {
  const parts = distributionName.split(":");
  const [groupId, artifactId] = parts;

  if (parts.length !== 2 || !groupId || !artifactId) {
    throw new ValidationError(`Malformed distribution name: ${distributionName}`, {
      distributionName,
    });
  }

  return { groupId, artifactId };
}

/**
 * Last path segment of an "owner/name" repository, e.g. "java-foo"
 */
export function repoShortName(repo: string): string {
  const short = repo.split("/").pop();

  if (!short) {
    throw new ValidationError(`Malformed repository name: ${repo}`, { repo });
  }

  return short;
}
