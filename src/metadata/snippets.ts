import { readFile } from "fs/promises";
import path from "path";

import { logger } from "../lib/logger.js";

import { expandGlobs, type DiscoveryOptions } from "./samples.js";

import type { Snippets } from "./schema/index.js";

const log = logger.child("[snippets]");

/**
 * Sources scanned for snippets: the samples plus their pom.xml files
 */
export const DEFAULT_SNIPPET_GLOBS = ["samples/**/src/main/java/**/*.java", "samples/**/pom.xml"];

const OPEN_SNIPPET_REGEX = /\[START ([\w-]+)\]/;
const CLOSE_SNIPPET_REGEX = /\[END ([\w-]+)\]/;

/**
 * Remove the indentation shared by every non-blank line
 */
function dedent(lines: string[]): string[] {
  const indents = lines
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length);
  const shared = indents.length > 0 ? Math.min(...indents) : 0;

  return lines.map((line) => (line.trim().length > 0 ? line.slice(shared) : ""));
}

/**
 * Extract every snippet delimited by `[START name]` / `[END name]` markers
 *
 * Marker lines are not part of the snippet. Snippets may nest or overlap;
 * a line inside several open snippets belongs to each of them.
 */
export function snippetsFromContents(contents: string): Snippets {
  const lines = contents.split("\n").map((line) => line.replace(/\r$/, ""));
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }

  const snippetLines = new Map<string, string[]>();
  const open = new Set<string>();

  for (const line of lines) {
    const openMatch = OPEN_SNIPPET_REGEX.exec(line);
    const closeMatch = CLOSE_SNIPPET_REGEX.exec(line);

    if (openMatch?.[1] && !closeMatch) {
      const name = openMatch[1];
      if (!snippetLines.has(name)) {
        snippetLines.set(name, []);
      }
      open.add(name);
    } else if (closeMatch?.[1] && !openMatch) {
      open.delete(closeMatch[1]);
    } else {
      for (const name of open) {
        snippetLines.get(name)?.push(line);
      }
    }
  }

  const snippets: Snippets = {};
  for (const [name, body] of snippetLines) {
    snippets[name] = dedent(body).join("\n");
  }
  return snippets;
}

/**
 * Collect snippets from every file matching the globs
 *
 * Files are read in path order; a later file's snippet replaces an earlier one of the same name.
 */
export async function allSnippets(globs: string[], options: DiscoveryOptions = {}): Promise<Snippets> {
  const cwd = options.cwd ?? process.cwd();
  const files = await expandGlobs(globs, { cwd });
  const snippets: Snippets = {};

  for (const file of files) {
    const contents = await readFile(path.join(cwd, file), "utf-8");
    for (const [name, code] of Object.entries(snippetsFromContents(contents))) {
      if (name in snippets) {
        log.debug(`snippet ${name} redefined in ${file}`);
      }
      snippets[name] = code;
    }
  }

  return snippets;
}
