/**
 * README metadata: schema, derived values and assembly from a repository
 */

export * from "./schema/index.js";

export {
  parseDistributionName,
  repoShortName,
  LIBRARIES_BOM,
  type MavenCoordinates,
} from "./coordinates.js";
export {
  latestMavenVersion,
  versionFromMavenMetadata,
  mavenMetadataUrl,
  DEFAULT_MAVEN_REPOSITORY,
  type MavenLookupOptions,
} from "./maven.js";
export {
  allSamples,
  decamelize,
  expandGlobs,
  readSampleMetadataComment,
  sampleFromSource,
  DEFAULT_SAMPLE_GLOBS,
  type DiscoveryOptions,
} from "./samples.js";
export { allSnippets, snippetsFromContents, DEFAULT_SNIPPET_GLOBS } from "./snippets.js";
export { loadPartials, PARTIALS_FILES } from "./partials.js";
export {
  buildReadmeMetadata,
  loadRepoMetadata,
  loadReadmeMetadataFile,
  REPO_METADATA_FILE,
  type BuildOptions,
} from "./loader.js";
