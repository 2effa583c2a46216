import { Command } from "commander";

import { VERSION } from "../version.js";

import { runMetadata, runRender, type RenderCommandOptions } from "./commands/render.js";
import { runValidate } from "./commands/validate.js";

/**
 * Build the readme-synth command tree
 *
 * Commands:
 * - render   - Render README.md for a Java client library repository
 * - metadata - Print the metadata record the README is rendered from
 * - validate - Validate a metadata JSON file
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("readme-synth")
    .description("Render Java client library READMEs from repository metadata")
    .version(VERSION);

  program
    .command("render [dir]")
    .description("Render README.md for a repository")
    .option("-m, --metadata <file>", "Render from a metadata JSON file instead of the repository")
    .option("-o, --output <file>", "Output path, relative to the repository")
    .option("--stdout", "Print the README instead of writing it")
    .option("--offline", "Skip Maven version lookups")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (dir: string | undefined, options: RenderCommandOptions) => {
      process.exitCode = await runRender(dir, options);
    });

  program
    .command("metadata [dir]")
    .description("Print the assembled README metadata as JSON")
    .option("--offline", "Skip Maven version lookups")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (dir: string | undefined, options: RenderCommandOptions) => {
      process.exitCode = await runMetadata(dir, options);
    });

  program
    .command("validate <file>")
    .description("Validate a README metadata JSON file")
    .action(async (file: string) => {
      process.exitCode = await runValidate(file);
    });

  return program;
}
