import { LIBRARIES_BOM, parseDistributionName, repoShortName } from "../metadata/coordinates.js";

import type { ReadmeMetadata } from "../metadata/schema/index.js";
import type { TemplateValues } from "./renderer.js";

/**
 * A metadata record plus the values derived from it
 */
export interface ReadmeContext {
  metadata: ReadmeMetadata;
  groupId: string;
  artifactId: string;
  repoShort: string;
  /** Flat placeholder values shared by every section */
  values: TemplateValues;
}

export function createReadmeContext(metadata: ReadmeMetadata): ReadmeContext {
  const { groupId, artifactId } = parseDistributionName(metadata.repo.distribution_name);
  const repoShort = repoShortName(metadata.repo.repo);

  return {
    metadata,
    groupId,
    artifactId,
    repoShort,
    values: {
      name: metadata.repo.name,
      namePretty: metadata.repo.name_pretty,
      repo: metadata.repo.repo,
      repoShort,
      groupId,
      artifactId,
      latestVersion: metadata.latest_version,
      latestBomVersion: metadata.latest_bom_version,
      bomGroupId: LIBRARIES_BOM.groupId,
      bomArtifactId: LIBRARIES_BOM.artifactId,
      apiId: metadata.repo.api_id,
      apiDescription: metadata.repo.api_description,
      productDocumentation: metadata.repo.product_documentation,
      clientDocumentation: metadata.repo.client_documentation,
      minJavaVersion: metadata.min_java_version,
    },
  };
}

/**
 * Caller-supplied text, or undefined when missing or blank
 */
export function nonBlank(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.replace(/^\s*\n/, "").trimEnd();
  return trimmed.trim().length > 0 ? trimmed : undefined;
}
