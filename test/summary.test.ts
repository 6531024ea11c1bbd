import { describe, expect, it } from "vitest";
import { extractToolSummary } from "../src/utils/summary.ts";

describe("extractToolSummary", () => {
  describe("file tools", () => {
    it("returns path", () => {
      expect(extractToolSummary("readFile", { path: "src/index.ts" })).toBe(
        "src/index.ts",
      );
      expect(extractToolSummary("fsWrite", { path: "/out.txt" })).toBe("/out.txt");
      expect(extractToolSummary("strReplace", { path: "a.ts" })).toBe("a.ts");
    });

    it("returns targetFile for deletes", () => {
      expect(extractToolSummary("deleteFile", { targetFile: "old.ts" })).toBe(
        "old.ts",
      );
    });

    it("returns empty for missing path", () => {
      expect(extractToolSummary("readFile", {})).toBe("");
    });

    it("joins path lists", () => {
      expect(
        extractToolSummary("readMultipleFiles", { paths: ["a.ts", "b.ts"] }),
      ).toBe("a.ts, b.ts");
    });
  });

  describe("executeBash", () => {
    it("returns the command", () => {
      expect(extractToolSummary("executeBash", { command: "npm test" })).toBe(
        "npm test",
      );
    });

    it("truncates long commands", () => {
      const result = extractToolSummary("executeBash", { command: "a".repeat(100) });
      expect(result.length).toBe(60);
      expect(result.endsWith("...")).toBe(true);
    });
  });

  describe("grepSearch", () => {
    it("includes the include pattern", () => {
      expect(
        extractToolSummary("grepSearch", { query: "TODO", includePattern: "*.ts" }),
      ).toBe("TODO in *.ts");
    });

    it("returns just the query without a pattern", () => {
      expect(extractToolSummary("grepSearch", { query: "TODO" })).toBe("TODO");
    });
  });

  describe("unknown tools", () => {
    it("fall back to a path argument", () => {
      expect(extractToolSummary("customTool", { path: "x/y" })).toBe("x/y");
    });

    it("return empty without one", () => {
      expect(extractToolSummary("customTool", { foo: "bar" })).toBe("");
    });
  });

  describe("names shared with built-in object properties", () => {
    it("are treated as unknown tools", () => {
      expect(extractToolSummary("hasOwnProperty", { path: "a.ts" })).toBe("a.ts");
      expect(extractToolSummary("toString", {})).toBe("");
      expect(extractToolSummary("constructor", {})).toBe("");
      expect(extractToolSummary("__proto__", { targetFile: "b.ts" })).toBe("b.ts");
    });
  });

  describe("non-string arguments", () => {
    it("summarize scalars and ignore nested values", () => {
      expect(extractToolSummary("readFile", { path: 42 })).toBe("42");
      expect(extractToolSummary("readFile", { path: { nested: true } })).toBe("");
      expect(
        extractToolSummary("readMultipleFiles", { paths: ["a.ts", 7, "b.ts"] }),
      ).toBe("a.ts, b.ts");
    });
  });
});
