import { describe, it, expect } from "vitest";

import { createProgram } from "@/cli/program.js";
import { VERSION } from "@/version.js";

describe("createProgram", () => {
  it("registers every command", () => {
    const program = createProgram();
    expect(program.name()).toBe("readme-synth");
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(["render", "metadata", "validate"]);
  });

  it("exposes the render options", () => {
    const render = createProgram().commands.find((command) => command.name() === "render");
    expect(render?.options.map((option) => option.long)).toEqual([
      "--metadata",
      "--output",
      "--stdout",
      "--offline",
      "--verbose",
      "--quiet",
    ]);
  });
});
