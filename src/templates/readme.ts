import { SynthError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { err, tryCatch } from "../lib/result.js";
import { parseReadmeMetadata } from "../metadata/schema/index.js";

import { createReadmeContext } from "./context.js";
import { renderLinkDefinitions } from "./links.js";
import { README_SECTIONS, type ReadmeSection } from "./sections.js";
import { TemplateRenderError } from "./renderer.js";

import type { Result } from "../lib/result.js";
import type { ReadmeMetadata } from "../metadata/schema/index.js";

const log = logger.child("[readme]");

/**
 * Renders a client library README from a validated metadata record
 *
 * Rendering is pure: the same record always yields the same text.
 *
 * @example
 * ```typescript
 * const metadata = unwrap(parseReadmeMetadata(JSON.parse(json)));
 * const readme = new ReadmeRenderer().render(metadata);
 * ```
 */
export class ReadmeRenderer {
  constructor(private readonly sections: readonly ReadmeSection[] = README_SECTIONS) {}

  /**
   * Render the sections that apply, in order, followed by their link definitions
   */
  render(metadata: ReadmeMetadata): string {
    const ctx = createReadmeContext(metadata);

    const blocks: string[] = [];
    for (const section of this.sections) {
      const text = section.render(ctx);
      if (text === null) {
        log.debug(`section ${section.id} omitted`);
        continue;
      }
      blocks.push(text);
    }

    const body = blocks.join("\n\n");
    const definitions = renderLinkDefinitions(body, ctx);

    return definitions.length > 0 ? `${body}\n\n${definitions.join("\n")}\n` : `${body}\n`;
  }
}

/**
 * Render a README from a validated metadata record
 */
export function renderReadme(metadata: ReadmeMetadata): string {
  return new ReadmeRenderer().render(metadata);
}

/**
 * Validate untrusted input, then render it
 *
 * Malformed input is reported as a ValidationError before rendering starts.
 */
export function renderReadmeFromInput(input: unknown): Result<string, SynthError> {
  const metadata = parseReadmeMetadata(input);
  if (!metadata.success) {
    return metadata;
  }

  const rendered = tryCatch(() => renderReadme(metadata.data));
  if (rendered.success) {
    return rendered;
  }

  const error = rendered.error;
  return err(
    error instanceof SynthError ? error : new TemplateRenderError(error.message)
  );
}
