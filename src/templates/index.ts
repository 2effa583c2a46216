/**
 * Template Rendering Module
 *
 * - `TemplateRenderer` substitutes {{variable}} placeholders
 * - `ReadmeRenderer` composes the README sections and their link definitions
 *
 * @example
 * ```typescript
 * import { renderReadmeFromInput } from "./templates/index.js";
 *
 * const result = renderReadmeFromInput(JSON.parse(metadataJson));
 *
 * if (result.success) {
 *   console.log(result.data);
 * }
 * ```
 */

export {
  TemplateRenderer,
  TemplateRenderError,
  createRenderer,
  type RenderOptions,
  type RenderResult,
  type TemplateValue,
  type TemplateValues,
} from "./renderer.js";
export { createReadmeContext, nonBlank, type ReadmeContext } from "./context.js";
export {
  README_SECTIONS,
  CI_BUILDS,
  TRANSPORT_SENTENCES,
  ciBuildsFor,
  installSnippet,
  type CiBuild,
  type ReadmeSection,
} from "./sections.js";
export { LINK_DEFINITIONS, referencedLabels, renderLinkDefinitions, type LinkDefinition } from "./links.js";
export {
  ReadmeRenderer,
  renderReadme,
  renderReadmeFromInput,
} from "./readme.js";
