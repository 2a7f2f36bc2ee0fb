import { describe, it, expect } from "vitest";
import { formatError } from "../src/errors.js";

describe("errors", () => {
  describe("formatError", () => {
    it("provides suggestion for a missing BibTeX file", () => {
      const result = formatError(new Error("BibTeX file not found: /work/references.bib"));

      expect(result.message).toBe("BibTeX file not found: /work/references.bib");
      expect(result.suggestion).toContain("--bib");
      expect(result.suggestion).toContain("Looked for: /work/references.bib");
    });

    it("lists available keys for an unknown citation key", () => {
      const result = formatError(new Error("Citation key not found: smith2023. Available keys: doe2021, lee2019"));

      expect(result.suggestion).toBe("Keys are case-sensitive. Some keys in this file:\n  doe2021\n  lee2019");
    });

    it("points to the list command when no keys are known", () => {
      const result = formatError(new Error("Citation key not found: smith2023"));

      expect(result.suggestion).toContain("bibverify list");
    });

    it("provides suggestion for an invalid range", () => {
      const result = formatError(new Error("Invalid range 5-20. File has 12 entries."));

      expect(result.suggestion).toContain("between 1 and 12");
    });

    it("provides examples when no selection is given", () => {
      const result = formatError(new Error("Must specify either --key or both --start and --end"));

      expect(result.suggestion).toContain("bibverify verify --start 1 --end 10");
      expect(result.suggestion).toContain("bibverify verify --key smith2023paper");
    });

    it("provides suggestion for an unknown report format", () => {
      const result = formatError(new Error("Unknown report format html"));

      expect(result.suggestion).toBe("Supported formats: text, json, markdown (or md).");
    });

    it("provides suggestion for YAML syntax errors", () => {
      const result = formatError(new Error("Invalid YAML in /work/bibverify.config.yaml: unexpected end"));

      expect(result.suggestion).toContain("indentation");
      expect(result.suggestion).toContain("colons");
    });

    it("provides suggestion for invalid settings", () => {
      const result = formatError(new Error("Invalid settings: timeoutMs: Number must be greater than 0"));

      expect(result.suggestion).toContain("bibverify.config.yaml");
      expect(result.suggestion).toContain("BIBVERIFY_");
    });

    it("accepts plain strings", () => {
      expect(formatError("Invalid range 0-1. File has 3 entries.").suggestion).toContain("between 1 and 3");
    });

    it("returns only the message for unknown errors", () => {
      expect(formatError(new Error("Something else went wrong"))).toEqual({
        message: "Something else went wrong",
      });
    });
  });
});
