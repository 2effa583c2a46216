import { describe, it, expect, beforeEach } from "vitest";

import {
  TemplateRenderer,
  TemplateRenderError,
  createRenderer,
} from "@/templates/index.js";

describe("TemplateRenderer", () => {
  let renderer: TemplateRenderer;

  beforeEach(() => {
    renderer = new TemplateRenderer();
  });

  describe("substituteVariables", () => {
    it("stringifies numbers and booleans", () => {
      const result = renderer.substituteVariables("Java {{version}}+ ({{lts}})", {
        version: 11,
        lts: true,
      });
      expect(result.content).toBe("Java 11+ (true)");
      expect(result.substituted).toEqual(["version", "lts"]);
      expect(result.unresolved).toEqual([]);
    });

    it("does not rescan substituted values", () => {
      const result = renderer.substituteVariables("{{outer}}", { outer: "{{inner}}", inner: "x" });
      expect(result.content).toBe("{{inner}}");
    });

    it("drops unresolved placeholders by default", () => {
      const result = renderer.substituteVariables("a{{missing}}b", { missing: undefined });
      expect(result.content).toBe("ab");
      expect(result.unresolved).toEqual(["missing"]);
    });

    it("ignores invalid placeholder formats", () => {
      const template = "{{ space }} {{123invalid}} {{}} {single}";
      const result = renderer.substituteVariables(template, { space: "x" });
      expect(result.content).toBe(template);
      expect(result.substituted).toEqual([]);
    });
  });

  describe("render", () => {
    it("fails in strict mode on unresolved placeholders", () => {
      const result = renderer.render("{{name}} {{apiId}}", { name: "foo" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TemplateRenderError);
        expect(result.error.code).toBe("TEMPLATE_RENDER_ERROR");
        expect(result.error.context).toEqual({ unresolved: ["apiId"] });
      }
    });

    it("uses the renderer's strict setting by default", () => {
      const lenient = createRenderer({ strict: false });
      const result = lenient.render("Java {{minJavaVersion}}", {});
      expect(result).toEqual({
        success: true,
        data: { content: "Java ", substituted: [], unresolved: ["minJavaVersion"] },
      });
    });

    it("succeeds in non-strict mode", () => {
      const result = renderer.render("{{name}} {{apiId}}", { name: "foo" }, { strict: false });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.content).toBe("foo ");
      }
    });
  });

  describe("interpolate", () => {
    it("returns the rendered text", () => {
      expect(renderer.interpolate("{{a}}-{{b}}", { a: "x", b: 2 })).toBe("x-2");
    });

    it("throws on unresolved placeholders", () => {
      expect(() => renderer.interpolate("{{a}}", {})).toThrow(TemplateRenderError);
    });
  });
});
