import { describe, it, expect } from "vitest";

import {
  ReadmeMetadataSchema,
  RepoMetadataSchema,
  parseReadmeMetadata,
} from "@/metadata/index.js";

import { createRepoMetadata } from "@tests/fixtures/metadata.js";

describe("RepoMetadataSchema", () => {
  it("applies defaults for release level and billing", () => {
    const { release_level, requires_billing, ...rest } = createRepoMetadata();
    expect(release_level).toBe("ga");
    expect(requires_billing).toBe(false);

    const parsed = RepoMetadataSchema.parse(rest);
    expect(parsed.release_level).toBe("unknown");
    expect(parsed.requires_billing).toBe(false);
  });

  it("rejects unknown transports", () => {
    const result = RepoMetadataSchema.safeParse({ ...createRepoMetadata(), transport: "rest" });
    expect(result.success).toBe(false);
  });

  it.each([
    ["transport", ""],
    ["transport", null],
    ["api_id", ""],
    ["api_id", null],
  ])("treats %s %j as unset", (field, value) => {
    const parsed = RepoMetadataSchema.parse({ ...createRepoMetadata(), [field]: value });
    expect(parsed.transport).toBeUndefined();
    expect(parsed.api_id).toBeUndefined();
  });

  it("keeps a set transport and API id", () => {
    const parsed = RepoMetadataSchema.parse({
      ...createRepoMetadata(),
      transport: "grpc",
      api_id: "foo.googleapis.com",
    });
    expect(parsed.transport).toBe("grpc");
    expect(parsed.api_id).toBe("foo.googleapis.com");
  });

  it("rejects non-URL documentation links", () => {
    const result = RepoMetadataSchema.safeParse({
      ...createRepoMetadata(),
      product_documentation: "not a url",
    });
    expect(result.success).toBe(false);
  });
});

describe("ReadmeMetadataSchema", () => {
  it("fills in every optional field", () => {
    const parsed = ReadmeMetadataSchema.parse({ repo: createRepoMetadata() });
    expect(parsed).toMatchObject({
      latest_version: "0.0.0",
      latest_bom_version: "0.0.0",
      samples: [],
      partials: {},
      snippets: {},
      min_java_version: 7,
    });
  });
});

describe("parseReadmeMetadata", () => {
  it("reports every issue with its path", () => {
    const result = parseReadmeMetadata({
      repo: { ...createRepoMetadata(), release_level: "stable" },
      samples: [{ title: "Quickstart" }],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("VALIDATION_ERROR");
      const issues = result.error.context?.["issues"];
      expect(Array.isArray(issues)).toBe(true);
      expect(issues).toHaveLength(2);
      expect(String(issues)).toContain("repo.release_level:");
      expect(String(issues)).toContain("samples.0.file:");
    }
  });

  it("reports a non-object input at the root", () => {
    const result = parseReadmeMetadata("nope");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.context?.["issues"]).toEqual(["(root): Expected object, received string"]);
    }
  });
});
