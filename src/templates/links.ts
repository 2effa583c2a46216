import { CI_BUILDS } from "./sections.js";

import type { ReleaseLevel } from "../metadata/schema/index.js";
import type { ReadmeContext } from "./context.js";

/**
 * A reference-style link definition: `[label]: url`
 */
export interface LinkDefinition {
  label: string;
  /** Undefined when the metadata has nothing to link to */
  url(ctx: ReadmeContext): string | undefined;
}

const BADGE_BASE = "http://storage.googleapis.com/cloud-devrel-public/java/badges";

const STABILITY_BADGES: Record<ReleaseLevel, string> = {
  ga: "ga-green",
  beta: "beta-yellow",
  alpha: "alpha-orange",
  unknown: "unknown-red",
};

function fixed(label: string, url: string): LinkDefinition {
  return { label, url: () => url };
}

const ciBadgeLinks: LinkDefinition[] = CI_BUILDS.flatMap((build) => [
  {
    label: `kokoro-badge-image-${build.badgeNumber}`,
    url: (ctx: ReadmeContext) => `${BADGE_BASE}/${ctx.repoShort}/${build.badge}.svg`,
  },
  {
    label: `kokoro-badge-link-${build.badgeNumber}`,
    url: (ctx: ReadmeContext) => `${BADGE_BASE}/${ctx.repoShort}/${build.badge}.html`,
  },
]);

/**
 * Every link the README can reference, in the order definitions are written
 */
export const LINK_DEFINITIONS: readonly LinkDefinition[] = [
  { label: "product-docs", url: (ctx) => ctx.metadata.repo.product_documentation },
  { label: "javadocs", url: (ctx) => ctx.metadata.repo.client_documentation },
  ...ciBadgeLinks,
  {
    label: "stability-image",
    url: (ctx) => `https://img.shields.io/badge/stability-${STABILITY_BADGES[ctx.metadata.repo.release_level]}`,
  },
  {
    label: "maven-version-image",
    url: (ctx) => `https://img.shields.io/maven-central/v/${ctx.groupId}/${ctx.artifactId}.svg`,
  },
  {
    label: "maven-version-link",
    url: (ctx) => `https://search.maven.org/search?q=g:${ctx.groupId}%20AND%20a:${ctx.artifactId}&core=gav`,
  },
  fixed("authentication", "https://github.com/googleapis/google-cloud-java#authentication"),
  fixed("developer-console", "https://console.developers.google.com/"),
  fixed("create-project", "https://cloud.google.com/resource-manager/docs/creating-managing-projects"),
  fixed("cloud-sdk", "https://cloud.google.com/sdk/"),
  fixed(
    "troubleshooting",
    "https://github.com/googleapis/google-cloud-common/blob/master/troubleshooting/readme.md#troubleshooting"
  ),
  {
    label: "contributing",
    url: (ctx) => `https://github.com/${ctx.metadata.repo.repo}/blob/master/CONTRIBUTING.md`,
  },
  {
    label: "code-of-conduct",
    url: (ctx) =>
      `https://github.com/${ctx.metadata.repo.repo}/blob/master/CODE_OF_CONDUCT.md#contributor-code-of-conduct`,
  },
  { label: "license", url: (ctx) => `https://github.com/${ctx.metadata.repo.repo}/blob/master/LICENSE` },
  {
    label: "enable-billing",
    url: (ctx) =>
      ctx.metadata.repo.requires_billing
        ? "https://cloud.google.com/apis/docs/getting-started#enabling_billing"
        : undefined,
  },
  {
    label: "enable-api",
    url: (ctx) => {
      const apiId = ctx.metadata.repo.api_id;
      return apiId ? `https://console.cloud.google.com/flows/enableapi?apiid=${apiId}` : undefined;
    },
  },
  fixed(
    "libraries-bom",
    "https://github.com/GoogleCloudPlatform/cloud-opensource-java/wiki/The-Google-Cloud-Platform-Libraries-BOM"
  ),
  fixed("shell_img", "https://gstatic.com/cloudssh/images/open-btn.png"),
];

/**
 * `[label]` directly after a `]`, i.e. the second half of `[text][label]`
 */
const REFERENCE_REGEX = /(?<=\])\[([A-Za-z0-9_-]+)\]/g;

/**
 * Labels referenced by reference-style links in a Markdown body
 */
export function referencedLabels(body: string): Set<string> {
  const labels = new Set<string>();
  for (const match of body.matchAll(REFERENCE_REGEX)) {
    if (match[1]) {
      labels.add(match[1]);
    }
  }
  return labels;
}

/**
 * Definitions for exactly the known labels the body references
 *
 * Labels the body uses but that are not ours (e.g. from a partial that
 * defines its own links) are left alone.
 */
export function renderLinkDefinitions(body: string, ctx: ReadmeContext): string[] {
  const used = referencedLabels(body);
  const lines: string[] = [];

  for (const definition of LINK_DEFINITIONS) {
    if (!used.has(definition.label)) {
      continue;
    }
    const url = definition.url(ctx);
    if (url !== undefined) {
      lines.push(`[${definition.label}]: ${url}`);
    }
  }

  return lines;
}
