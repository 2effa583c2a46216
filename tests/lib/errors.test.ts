import { describe, it, expect } from "vitest";
import {
  SynthError,
  ValidationError,
  ParseError,
  ConfigError,
  FetchError,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("SynthError", () => {
    it("should create a basic error", () => {
      const error = new SynthError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("SynthError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
    });

    it("should have a stack trace", () => {
      const error = new SynthError("Test message", "TEST_CODE");
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new SynthError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "SynthError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ValidationError", () => {
    it("should carry validation issues", () => {
      const error = new ValidationError("Invalid README metadata", {
        issues: ["repo.name: Required"],
      });
      expect(error.name).toBe("ValidationError");
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.context).toEqual({ issues: ["repo.name: Required"] });
      expect(error).toBeInstanceOf(SynthError);
    });
  });

  describe("ParseError", () => {
    it("should record the file path", () => {
      const error = new ParseError("Invalid JSON", "/repo/.repo-metadata.json");
      expect(error.code).toBe("PARSE_ERROR");
      expect(error.filePath).toBe("/repo/.repo-metadata.json");
      expect(error.line).toBeUndefined();
      expect(error).toBeInstanceOf(SynthError);
    });

    it("should include the line number in context", () => {
      const error = new ParseError("Invalid YAML", "/repo/.readme-partials.yaml", 3);
      expect(error.context).toEqual({
        filePath: "/repo/.readme-partials.yaml",
        line: 3,
      });
    });
  });

  describe("ConfigError", () => {
    it("should create a config error", () => {
      const error = new ConfigError("Invalid .readme-synth.json", { filePath: "/repo/.readme-synth.json" });
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error.context).toEqual({ filePath: "/repo/.readme-synth.json" });
    });
  });

  describe("FetchError", () => {
    it("should record the url in context", () => {
      const url = "https://repo.example.com/maven2/com/example/lib/maven-metadata.xml";
      const error = new FetchError("Failed to look up com.example:lib: timeout", url, {
        groupId: "com.example",
      });
      expect(error.name).toBe("FetchError");
      expect(error.code).toBe("FETCH_ERROR");
      expect(error.url).toBe(url);
      expect(error.context).toEqual({ groupId: "com.example", url });
    });
  });
});
