import { nonBlank, type ReadmeContext } from "./context.js";
import { createRenderer } from "./renderer.js";

import type { Sample, Transport } from "../metadata/schema/index.js";

/**
 * One README section; `render` returns null when the section is omitted
 */
export interface ReadmeSection {
  id: string;
  render(ctx: ReadmeContext): string | null;
}

/**
 * A CI build listed in the CI Status table, numbered as its badge links
 */
export interface CiBuild {
  badgeNumber: number;
  label: string;
  javaVersion: number;
  /** File name of the badge under the repository's badge directory */
  badge: string;
}

export const CI_BUILDS: readonly CiBuild[] = [
  { badgeNumber: 1, label: "Java 7", javaVersion: 7, badge: "java7" },
  { badgeNumber: 2, label: "Java 8", javaVersion: 8, badge: "java8" },
  { badgeNumber: 3, label: "Java 8 OSX", javaVersion: 8, badge: "java8-osx" },
  { badgeNumber: 4, label: "Java 8 Windows", javaVersion: 8, badge: "java8-win" },
  { badgeNumber: 5, label: "Java 11", javaVersion: 11, badge: "java11" },
];

const NEWEST_CI_JAVA_VERSION = 11;

/**
 * Builds shown for a library; the newest Java build is always listed
 */
export function ciBuildsFor(minJavaVersion: number): CiBuild[] {
  return CI_BUILDS.filter(
    (build) => build.javaVersion >= minJavaVersion || build.javaVersion === NEWEST_CI_JAVA_VERSION
  );
}

const templates = createRenderer({ strict: true });

function t(template: string, ctx: ReadmeContext, extra: Record<string, string> = {}): string {
  return templates.interpolate(template, { ...ctx.values, ...extra });
}

function isPreRelease(ctx: ReadmeContext): boolean {
  const level = ctx.metadata.repo.release_level;
  return level === "alpha" || level === "beta";
}

const TITLE = `# Google {{namePretty}} Client for Java

Java idiomatic client for [{{namePretty}}][product-docs].

[![Maven][maven-version-image]][maven-version-link]
![Stability][stability-image]`;

const DOC_LINKS = `- [Product Documentation][product-docs]
- [Client Library Documentation][javadocs]`;

const WORK_IN_PROGRESS_NOTICE = `> Note: This client is a work-in-progress, and may occasionally
> make backwards-incompatible changes.`;

const DEFAULT_BOM_INSTALL = `<dependencyManagement>
  <dependencies>
    <dependency>
      <groupId>{{bomGroupId}}</groupId>
      <artifactId>{{bomArtifactId}}</artifactId>
      <version>{{latestBomVersion}}</version>
      <type>pom</type>
      <scope>import</scope>
    </dependency>
  </dependencies>
</dependencyManagement>

<dependencies>
  <dependency>
    <groupId>{{groupId}}</groupId>
    <artifactId>{{artifactId}}</artifactId>
  </dependency>
</dependencies>`;

const DEFAULT_INSTALL = `<dependency>
  <groupId>{{groupId}}</groupId>
  <artifactId>{{artifactId}}</artifactId>
  <version>{{latestVersion}}</version>
</dependency>`;

const QUICKSTART = `## Quickstart

If you are using Maven with [BOM][libraries-bom], add this to your pom.xml file
\`\`\`xml
{{bomInstall}}
\`\`\`

If you are using Maven without BOM, add this to your dependencies:

\`\`\`xml
{{install}}
\`\`\`

If you are using Gradle, add this to your dependencies
\`\`\`Groovy
compile '{{groupId}}:{{artifactId}}:{{latestVersion}}'
\`\`\`
If you are using SBT, add this to your dependencies
\`\`\`Scala
libraryDependencies += "{{groupId}}" % "{{artifactId}}" % "{{latestVersion}}"
\`\`\``;

const AUTHENTICATION = `## Authentication

See the [Authentication][authentication] section in the base directory's README.`;

const PREREQUISITES_INTRO =
  "You will need a [Google Cloud Platform Console][developer-console] project with the {{namePretty}} {{apiEnabled}}.";

const BILLING = "You will need to [enable billing][enable-billing] to use Google {{namePretty}}.";

const PREREQUISITES_SETUP = `[Follow these instructions][create-project] to get your project set up. You will also need to set up the local development environment by
[installing the Google Cloud SDK][cloud-sdk] and running the following commands in command line:
\`gcloud auth login\` and \`gcloud config set project [YOUR PROJECT ID]\`.`;

const INSTALLATION = `### Installation and setup

You'll need to obtain the \`{{artifactId}}\` library.  See the [Quickstart](#quickstart) section
to add \`{{artifactId}}\` as a dependency in your code.`;

const DEFAULT_ABOUT = `[{{namePretty}}][product-docs] {{apiDescription}}

See the [{{namePretty}} client library docs][javadocs] to learn how to
use this {{namePretty}} Client Library.`;

const SAMPLES_INTRO = `## Samples

Samples are in the [\`samples/\`](https://github.com/{{repo}}/tree/master/samples) directory. The samples' \`README.md\`
has instructions for running the samples.

| Sample                      | Source Code                       | Try it |
| --------------------------- | --------------------------------- | ------ |`;

const SAMPLE_ROW =
  "| {{title}} | [source code](https://github.com/{{repo}}/blob/master/{{file}}) | [![Open in Cloud Shell][shell_img]](https://console.cloud.google.com/cloudshell/open?git_repo=https://github.com/{{repo}}&page=editor&open_in_editor={{file}}) |";

const TROUBLESHOOTING = `## Troubleshooting

To get help, follow the instructions in the [shared Troubleshooting document][troubleshooting].`;

export const TRANSPORT_SENTENCES: Record<Transport, string> = {
  grpc: "{{namePretty}} uses gRPC for the transport layer.",
  http: "{{namePretty}} uses HTTP/JSON for the transport layer.",
  both: "{{namePretty}} uses both gRPC and HTTP/JSON for the transport layer.",
  none: "{{namePretty}} does not use a network transport layer.",
};

const JAVA_VERSIONS = `## Java Versions

Java {{minJavaVersion}} or above is required for using this client.`;

const VERSIONING = `## Versioning

This library follows [Semantic Versioning](http://semver.org/).`;

const MAJOR_VERSION_ZERO = `It is currently in major version zero (\`\`0.y.z\`\`), which means that anything may change at any time
and the public API should not be considered stable.`;

const DEFAULT_CONTRIBUTING = `Contributions to this library are always welcome and highly encouraged.

See [CONTRIBUTING][contributing] for more information how to get started.

Please note that this project is released with a Contributor Code of Conduct. By participating in
this project you agree to abide by its terms. See [Code of Conduct][code-of-conduct] for more
information.`;

const LICENSE = `## License

Apache 2.0 - See [LICENSE][license] for more information.`;

const CI_ROW = "{{label}} | [![Kokoro CI][kokoro-badge-image-{{badgeNumber}}]][kokoro-badge-link-{{badgeNumber}}]";

/**
 * Install snippet supplied by the repository, if any
 */
export function installSnippet(ctx: ReadmeContext, withBom: boolean): string | undefined {
  const key = `${ctx.metadata.repo.name}_install_${withBom ? "with" : "without"}_bom`;
  return nonBlank(ctx.metadata.snippets[key]);
}

function sampleRow(ctx: ReadmeContext, sample: Sample): string {
  return t(SAMPLE_ROW, ctx, {
    title: sample.title.replace(/\|/g, "\\|"),
    file: sample.file,
  });
}

/**
 * README sections in document order
 */
export const README_SECTIONS: readonly ReadmeSection[] = [
  { id: "title", render: (ctx) => t(TITLE, ctx) },
  { id: "doc-links", render: () => DOC_LINKS },
  {
    id: "work-in-progress",
    render: (ctx) => (isPreRelease(ctx) ? WORK_IN_PROGRESS_NOTICE : null),
  },
  {
    id: "quickstart",
    render: (ctx) =>
      t(QUICKSTART, ctx, {
        bomInstall: installSnippet(ctx, true) ?? t(DEFAULT_BOM_INSTALL, ctx),
        install: installSnippet(ctx, false) ?? t(DEFAULT_INSTALL, ctx),
      }),
  },
  { id: "authentication", render: () => AUTHENTICATION },
  {
    id: "getting-started",
    render: (ctx) => {
      const apiEnabled = ctx.metadata.repo.api_id ? "[API enabled][enable-api]" : "API enabled";
      const prerequisites = [t(PREREQUISITES_INTRO, ctx, { apiEnabled })];
      if (ctx.metadata.repo.requires_billing) {
        prerequisites.push(t(BILLING, ctx));
      }
      prerequisites.push(PREREQUISITES_SETUP);

      return [
        "## Getting Started",
        `### Prerequisites\n\n${prerequisites.join("\n")}`,
        t(INSTALLATION, ctx),
      ].join("\n\n");
    },
  },
  {
    id: "about",
    render: (ctx) => `## About\n\n${nonBlank(ctx.metadata.partials.about) ?? t(DEFAULT_ABOUT, ctx)}`,
  },
  {
    id: "custom-content",
    render: (ctx) => nonBlank(ctx.metadata.partials.custom_content) ?? null,
  },
  {
    id: "samples",
    render: (ctx) => {
      if (ctx.metadata.samples.length === 0) {
        return null;
      }
      const rows = ctx.metadata.samples.map((sample) => sampleRow(ctx, sample));
      return [t(SAMPLES_INTRO, ctx), ...rows].join("\n");
    },
  },
  { id: "troubleshooting", render: () => TROUBLESHOOTING },
  {
    id: "transport",
    render: (ctx) => {
      const transport = ctx.metadata.repo.transport;
      if (!transport) {
        return null;
      }
      return `## Transport\n\n${t(TRANSPORT_SENTENCES[transport], ctx)}`;
    },
  },
  { id: "java-versions", render: (ctx) => t(JAVA_VERSIONS, ctx) },
  {
    id: "versioning",
    render: (ctx) => (isPreRelease(ctx) ? `${VERSIONING}\n\n${MAJOR_VERSION_ZERO}` : VERSIONING),
  },
  {
    id: "contributing",
    render: (ctx) =>
      `## Contributing\n\n${nonBlank(ctx.metadata.partials.contributing) ?? DEFAULT_CONTRIBUTING}`,
  },
  { id: "license", render: () => LICENSE },
  {
    id: "ci-status",
    render: (ctx) => {
      const rows = ciBuildsFor(ctx.metadata.min_java_version).map((build) =>
        templates.interpolate(CI_ROW, { label: build.label, badgeNumber: build.badgeNumber })
      );
      return [
        "## CI Status",
        ["Java Version | Status", "------------ | ------", ...rows].join("\n"),
        "Java is a registered trademark of Oracle and/or its affiliates.",
      ].join("\n\n");
    },
  },
];
