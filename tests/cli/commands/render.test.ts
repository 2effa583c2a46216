import { existsSync, readFileSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { runMetadata, runRender } from "@/cli/commands/render.js";
import { logger } from "@/lib/logger.js";

import { createMetadata, createRepoMetadata } from "@tests/fixtures/metadata.js";

const GA_MINIMAL = readFileSync(
  fileURLToPath(new URL("../../fixtures/readme/ga-minimal.md", import.meta.url)),
  "utf-8"
);

describe("render command", () => {
  let repoDir: string;

  beforeEach(async () => {
    repoDir = await mkdtemp(path.join(os.tmpdir(), "readme-synth-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logger.configure({ level: "info" });
    await rm(repoDir, { recursive: true, force: true });
  });

  async function writeJson(name: string, value: unknown): Promise<string> {
    const file = path.join(repoDir, name);
    await writeFile(file, JSON.stringify(value));
    return file;
  }

  describe("runRender", () => {
    it("renders from a metadata file", async () => {
      const metadataFile = await writeJson("metadata.json", createMetadata());

      const code = await runRender(repoDir, { metadata: metadataFile });

      expect(code).toBe(0);
      expect(await readFile(path.join(repoDir, "README.md"), "utf-8")).toBe(GA_MINIMAL);
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it("assembles metadata from the repository offline", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());

      const code = await runRender(repoDir, { offline: true, quiet: true });

      expect(code).toBe(0);
      const readme = await readFile(path.join(repoDir, "README.md"), "utf-8");
      expect(readme).toContain("compile 'com.google.cloud:google-cloud-foo:0.0.0'");
      expect(console.log).not.toHaveBeenCalled();
    });

    it("writes to the configured output path", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());
      await writeJson(".readme-synth.json", { output: "docs/README.md" });

      const code = await runRender(repoDir, { offline: true, quiet: true });

      expect(code).toBe(0);
      const readme = await readFile(path.join(repoDir, "docs", "README.md"), "utf-8");
      expect(readme.startsWith("# Google Cloud Foo Client for Java\n")).toBe(true);
    });

    it("prefers --output over the config file", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());
      await writeJson(".readme-synth.json", { output: "docs/README.md" });

      await runRender(repoDir, { offline: true, quiet: true, output: "OUT.md" });

      await expect(readFile(path.join(repoDir, "OUT.md"), "utf-8")).resolves.toContain("## Quickstart");
    });

    it("prints to stdout with --stdout", async () => {
      const metadataFile = await writeJson("metadata.json", createMetadata());
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

      const code = await runRender(repoDir, { metadata: metadataFile, stdout: true });

      expect(code).toBe(0);
      expect(write).toHaveBeenCalledWith(GA_MINIMAL);
    });

    it("reports an invalid config file when rendering from a metadata file", async () => {
      const metadataFile = await writeJson("metadata.json", createMetadata());
      await writeJson(".readme-synth.json", { output: "" });

      const code = await runRender(repoDir, { metadata: metadataFile });

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Invalid .readme-synth.json"));
      expect(existsSync(path.join(repoDir, "README.md"))).toBe(false);
    });

    it("reports an invalid config file when assembling metadata", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());
      await writeJson(".readme-synth.json", { timeoutMs: "soon" });

      const code = await runRender(repoDir, { offline: true, quiet: true });

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Invalid .readme-synth.json"));
    });

    it("fails without .repo-metadata.json", async () => {
      const code = await runRender(repoDir, { offline: true, quiet: true });
      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("fails for a missing directory", async () => {
      const code = await runRender(path.join(repoDir, "missing"), { quiet: true });
      expect(code).toBe(1);
    });
  });

  describe("runMetadata", () => {
    it("reports an invalid config file", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());
      await writeJson(".readme-synth.json", { sampleGlobs: [] });

      const code = await runMetadata(repoDir, { offline: true, quiet: true });

      expect(code).toBe(1);
      expect(console.log).not.toHaveBeenCalled();
    });

    it("prints the assembled record as JSON", async () => {
      await writeJson(".repo-metadata.json", createRepoMetadata());

      const code = await runMetadata(repoDir, { offline: true, quiet: true });

      expect(code).toBe(0);
      expect(console.log).toHaveBeenCalledWith(
        JSON.stringify(createMetadata({ latest_version: "0.0.0", latest_bom_version: "0.0.0" }), null, 2)
      );
    });
  });
});
