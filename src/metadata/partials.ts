import { existsSync } from "fs";
import { readFile } from "fs/promises";
import path from "path";

import YAML from "yaml";

import { ParseError, ValidationError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import { PartialsSchema } from "./schema/index.js";

import type { SynthError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Partials } from "./schema/index.js";

/**
 * Partials file names, in lookup order
 */
export const PARTIALS_FILES = [".readme-partials.yaml", ".readme-partials.yml"];

/**
 * Load README partials from a repository directory
 *
 * A repository without a partials file has no partials. Keys other than
 * `about`, `custom_content` and `contributing` are ignored.
 */
export async function loadPartials(dir: string): Promise<Result<Partials, SynthError>> {
  const file = PARTIALS_FILES.map((name) => path.join(dir, name)).find((candidate) => existsSync(candidate));
  if (file === undefined) {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(await readFile(file, "utf-8"));
  } catch (error) {
    return err(
      new ParseError(
        `Invalid YAML in partials: ${error instanceof Error ? error.message : String(error)}`,
        file
      )
    );
  }

  if (parsed === null || parsed === undefined) {
    return ok({});
  }

  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    return err(new ParseError("Partials file must contain a mapping", file));
  }

  const result = PartialsSchema.safeParse(parsed);
  if (!result.success) {
    return err(
      new ValidationError("Invalid partials", {
        filePath: file,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      })
    );
  }

  return ok(result.data);
}
