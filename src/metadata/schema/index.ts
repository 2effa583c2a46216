import { ValidationError } from "../../lib/errors.js";
import { ok, err } from "../../lib/result.js";

import { ReadmeMetadataSchema } from "./metadata.schema.js";

import type { Result } from "../../lib/result.js";
import type { ReadmeMetadata } from "./metadata.schema.js";

export {
  ReleaseLevelSchema,
  TransportSchema,
  RepoMetadataSchema,
  SampleSchema,
  PartialsSchema,
  SnippetsSchema,
  ReadmeMetadataSchema,
  FALLBACK_VERSION,
  DEFAULT_MIN_JAVA_VERSION,
} from "./metadata.schema.js";

export type {
  ReleaseLevel,
  Transport,
  RepoMetadata,
  Sample,
  Partials,
  Snippets,
  ReadmeMetadata,
  ReadmeMetadataInput,
} from "./metadata.schema.js";

/**
 * Validate an untrusted value as a metadata record, applying defaults
 *
 * Every zod issue is reported as "path: message" in the error context.
 */
export function parseReadmeMetadata(input: unknown): Result<ReadmeMetadata, ValidationError> {
  const result = ReadmeMetadataSchema.safeParse(input);
  if (result.success) {
    return ok(result.data);
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });

  return err(new ValidationError("Invalid README metadata", { issues }));
}
