import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("chalk", () => ({
  default: {
    gray: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
  },
}));

import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("defaults to info", () => {
    const log = new Logger();
    log.debug("hidden");
    log.info("shown");
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).toHaveBeenCalledWith("shown");
  });

  it("prefixes messages", () => {
    const log = new Logger("[maven]");
    log.warn("slow response");
    expect(console.warn).toHaveBeenCalledWith("[maven] slow response");
  });

  it("shares its level with children", () => {
    const parent = new Logger();
    const child = parent.child("[metadata]");

    parent.configure({ level: "debug" });
    child.debug("reading samples");

    expect(child.level).toBe("debug");
    expect(console.debug).toHaveBeenCalledWith("[metadata] reading samples");
  });

  it("nests child prefixes", () => {
    const log = new Logger("[a]").child("[b]");
    log.error("failed");
    expect(console.error).toHaveBeenCalledWith("[a] [b] failed");
  });

  it("is quiet when silent", () => {
    const log = new Logger();
    log.configure({ level: "silent" });
    log.error("nothing");
    log.success("nothing");
    expect(console.error).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(log.isLevelEnabled("error")).toBe(false);
  });
});
