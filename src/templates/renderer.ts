import { SynthError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import type { Result } from "../lib/result.js";

/**
 * Error for template rendering failures
 */
export class TemplateRenderError extends SynthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "TEMPLATE_RENDER_ERROR", context);
    this.name = "TemplateRenderError";
  }
}

/**
 * Matches {{variableName}} placeholders
 */
const PLACEHOLDER_REGEX = /\{\{([a-zA-Z][a-zA-Z0-9_]*)\}\}/g;

/**
 * Values a placeholder can be substituted with
 */
export type TemplateValue = string | number | boolean | undefined;

export type TemplateValues = Record<string, TemplateValue>;

export interface RenderOptions {
  /** Fail when a placeholder has no value */
  strict?: boolean;
}

export interface RenderResult {
  content: string;
  /** Variables that were substituted */
  substituted: string[];
  /** Variables that had no value */
  unresolved: string[];
}

/**
 * Substitutes {{name}} placeholders in a template string
 *
 * Substitution is a single pass: a substituted value is never scanned
 * for further placeholders.
 *
 * @example
 * ```typescript
 * const renderer = new TemplateRenderer();
 *
 * const result = renderer.render("Java {{minJavaVersion}} or above", { minJavaVersion: 8 });
 *
 * if (result.success) {
 *   console.log(result.data.content);
 * }
 * ```
 */
export class TemplateRenderer {
  private readonly options: Required<RenderOptions>;

  constructor(options: RenderOptions = {}) {
    this.options = {
      strict: options.strict ?? true,
    };
  }

  /**
   * Substitute values into a template
   *
   * Unresolved placeholders are removed; a variable present with an
   * `undefined` value counts as unresolved.
   */
  substituteVariables(template: string, values: TemplateValues): RenderResult {
    const substituted: string[] = [];
    const unresolved: string[] = [];

    const content = template.replace(
      new RegExp(PLACEHOLDER_REGEX.source, "g"),
      (_match: string, name: string) => {
        const value = values[name];
        if (value !== undefined) {
          substituted.push(name);
          return String(value);
        }

        unresolved.push(name);
        return "";
      }
    );

    return {
      content,
      substituted: [...new Set(substituted)],
      unresolved: [...new Set(unresolved)],
    };
  }

  /**
   * Render a template, failing in strict mode when any placeholder is unresolved
   */
  render(
    template: string,
    values: TemplateValues,
    options?: RenderOptions
  ): Result<RenderResult, TemplateRenderError> {
    const strict = options?.strict ?? this.options.strict;
    const result = this.substituteVariables(template, values);

    if (strict && result.unresolved.length > 0) {
      return err(
        new TemplateRenderError("Unresolved template variables", {
          unresolved: result.unresolved,
        })
      );
    }

    return ok(result);
  }

  /**
   * Render a template known to be complete, throwing on unresolved placeholders
   */
  interpolate(template: string, values: TemplateValues): string {
    const result = this.render(template, values, { strict: true });
    if (!result.success) {
      throw result.error;
    }
    return result.data.content;
  }
}

/**
 * Factory function to create a TemplateRenderer with default options
 */
export function createRenderer(options?: RenderOptions): TemplateRenderer {
  return new TemplateRenderer(options);
}
