import { z } from "zod";

/**
 * Release levels a library can declare in `.repo-metadata.json`
 */
export const ReleaseLevelSchema = z.enum(["alpha", "beta", "ga", "unknown"]);

/**
 * Transport layers a client library can use
 */
export const TransportSchema = z.enum(["grpc", "http", "both", "none"]);

/**
 * Version used when a Maven lookup is skipped or the artifact is unpublished
 */
export const FALLBACK_VERSION = "0.0.0";

/**
 * Minimum Java version assumed when the repository declares none
 */
export const DEFAULT_MIN_JAVA_VERSION = 7;

/**
 * "group:artifact", both parts non-empty
 */
const DISTRIBUTION_NAME_PATTERN = /^[^:]+:[^:]+$/;

/**
 * Empty strings and nulls in optional fields mean "not set"
 */
function blankAsUnset(value: unknown): unknown {
  return value === "" || value === null ? undefined : value;
}

/**
 * Schema for the contents of `.repo-metadata.json`
 */
export const RepoMetadataSchema = z.object({
  /** Maven coordinates as "group:artifact" */
  distribution_name: z
    .string()
    .regex(DISTRIBUTION_NAME_PATTERN, "distribution_name must be 'group:artifact'"),

  /** Short API name, also the prefix of install snippet names */
  name: z.string().min(1),

  /** Display name used in prose */
  name_pretty: z.string().min(1),

  /** GitHub repository as "owner/name" */
  repo: z
    .string()
    .min(1)
    .refine((value) => (value.split("/").pop() ?? "").length > 0, {
      message: "repo must end with a non-empty path segment",
    }),

  release_level: ReleaseLevelSchema.default("unknown"),

  requires_billing: z.boolean().default(false),

  product_documentation: z.string().url(),

  client_documentation: z.string().url(),

  transport: z.preprocess(blankAsUnset, TransportSchema.optional()),

  /** Service name used by the "enable API" console link */
  api_id: z.preprocess(blankAsUnset, z.string().min(1).optional()),

  api_description: z.string(),

  min_java_version: z.number().int().positive().optional(),
});

/**
 * A runnable sample listed in the README table
 */
export const SampleSchema = z.object({
  title: z.string().min(1),
  /** Path relative to the repository root */
  file: z.string().min(1),
});

/**
 * Caller-supplied prose that replaces synthesized sections
 */
export const PartialsSchema = z.object({
  about: z.string().optional(),
  custom_content: z.string().optional(),
  contributing: z.string().optional(),
});

/**
 * Snippets keyed by name, e.g. "<name>_install_with_bom"
 */
export const SnippetsSchema = z.record(z.string());

/**
 * Schema for the full record the README is rendered from
 */
export const ReadmeMetadataSchema = z.object({
  repo: RepoMetadataSchema,
  latest_version: z.string().min(1).default(FALLBACK_VERSION),
  latest_bom_version: z.string().min(1).default(FALLBACK_VERSION),
  samples: z.array(SampleSchema).default([]),
  partials: PartialsSchema.default({}),
  snippets: SnippetsSchema.default({}),
  min_java_version: z.number().int().positive().default(DEFAULT_MIN_JAVA_VERSION),
});

export type ReleaseLevel = z.infer<typeof ReleaseLevelSchema>;
export type Transport = z.infer<typeof TransportSchema>;
export type RepoMetadata = z.infer<typeof RepoMetadataSchema>;
export type Sample = z.infer<typeof SampleSchema>;
export type Partials = z.infer<typeof PartialsSchema>;
export type Snippets = z.infer<typeof SnippetsSchema>;
export type ReadmeMetadata = z.infer<typeof ReadmeMetadataSchema>;
/** Shape accepted before defaults are applied */
export type ReadmeMetadataInput = z.input<typeof ReadmeMetadataSchema>;
