/**
 * readme-synth
 *
 * Renders the README of a Java client library from its repository metadata.
 *
 * @example
 * ```typescript
 * import { buildReadmeMetadata, renderReadme } from "java-readme-synth";
 *
 * const metadata = await buildReadmeMetadata("./java-foo");
 * if (metadata.success) {
 *   console.log(renderReadme(metadata.data));
 * }
 * ```
 */

export { VERSION } from "./version.js";

export * from "./lib/index.js";
export * from "./metadata/index.js";
export * from "./templates/index.js";
