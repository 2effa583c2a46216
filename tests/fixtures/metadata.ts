import type { ReadmeMetadata, RepoMetadata } from "@/metadata/schema/index.js";

/**
 * Repository metadata for a fictional "foo" library
 */
export function createRepoMetadata(overrides: Partial<RepoMetadata> = {}): RepoMetadata {
  return {
    distribution_name: "com.google.cloud:google-cloud-foo",
    name: "foo",
    name_pretty: "Cloud Foo",
    repo: "googleapis/java-foo",
    release_level: "ga",
    requires_billing: false,
    product_documentation: "https://cloud.example.com/foo/docs",
    client_documentation: "https://googleapis.dev/java/google-cloud-foo/latest/index.html",
    api_description: "stores and retrieves foos.",
    ...overrides,
  };
}

/**
 * A complete, validated-shape metadata record
 */
export function createMetadata(
  overrides: Partial<Omit<ReadmeMetadata, "repo">> = {},
  repoOverrides: Partial<RepoMetadata> = {}
): ReadmeMetadata {
  return {
    repo: createRepoMetadata(repoOverrides),
    latest_version: "1.2.3",
    latest_bom_version: "9.0.0",
    samples: [],
    partials: {},
    snippets: {},
    min_java_version: 7,
    ...overrides,
  };
}
