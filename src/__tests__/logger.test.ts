import { describe, it, expect, beforeEach, vi, type MockInstance } from "vitest";
import { Logger, LoggerReport } from "../internal/logger.js";

describe("Logger", () => {
  let writeSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    Logger._clearCollected();
    vi.restoreAllMocks();
    // Suppress stdout during tests
    writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  describe("createReport().toString()", () => {
    it("returns empty string when no warnings", () => {
      expect(Logger.createReport().toString()).toBe("");
    });

    it("groups warnings by message, most frequent first", () => {
      Logger.logWarnings(
        [{ severity: "warning", type: "Unsupported at-rule is ignored", loc: null }],
        "/path/c.css",
      );
      Logger.logWarnings(
        [{ severity: "warning", type: "Empty rule is skipped", loc: null }],
        "/path/a.css",
      );
      Logger.logWarnings(
        [{ severity: "warning", type: "Empty rule is skipped", loc: null }],
        "/path/b.css",
      );

      expect(Logger.createReport().toString()).toBe(
        [
          "",
          "─".repeat(60),
          "Warning Summary: 3 warning(s) in 2 category(s)",
          "─".repeat(60),
          "",
          "▸ Empty rule is skipped (2)",
          "",
          "  /path/a.css",
          "",
          "  /path/b.css",
          "",
          "",
          "▸ Unsupported at-rule is ignored (1)",
          "",
          "  /path/c.css",
          "",
        ].join("\n"),
      );
    });

    it("deduplicates files within a category", () => {
      Logger.logWarnings(
        [
          { severity: "warning", type: "Empty rule is skipped", loc: { line: 1, column: 0 } },
          { severity: "warning", type: "Empty rule is skipped", loc: { line: 5, column: 0 } },
        ],
        "/path/missing-on-disk.css",
      );

      const report = Logger.createReport().toString();
      expect(report).toContain("Warning Summary: 2 warning(s) in 1 category(s)");
      expect(report).toContain("▸ Empty rule is skipped (2)");
      expect(report.match(/\/path\/missing-on-disk\.css/g)).toHaveLength(1);
      expect(report).toContain("  /path/missing-on-disk.css:1:0");
    });

    it("limits each category to ten files", () => {
      for (let i = 0; i < 12; i++) {
        Logger.logWarnings(
          [{ severity: "warning", type: "Empty rule is skipped", loc: null }],
          `/path/file${String(i).padStart(2, "0")}.css`,
        );
      }

      const report = Logger.createReport().toString();
      expect(report).toContain("  /path/file09.css");
      expect(report).not.toContain("/path/file10.css");
      expect(report).toContain("  ... and 2 more file(s)");
    });

    it("renders a snippet from the source text passed with the warnings", () => {
      const source = [".a { color: red; }", ".b { }", ".c { color: blue; }"].join("\n");
      Logger.logWarnings(
        [{ severity: "warning", type: "Empty rule is skipped", loc: { line: 2, column: 1 } }],
        "<preview>",
        source,
      );

      expect(Logger.createReport().toString()).toContain(
        [
          "  <preview>:2:1",
          "       1 | .a { color: red; }",
          "  >    2 | .b { }",
          "       3 | .c { color: blue; }",
        ].join("\n"),
      );
    });
  });

  describe("logging", () => {
    it("prints the location and warning type", () => {
      Logger.logWarnings(
        [
          {
            severity: "warning",
            type: "Unsupported at-rule is ignored",
            loc: { line: 3, column: 1 },
            context: { atRule: "@font-face" },
          },
        ],
        "/path/a.css",
      );
      expect(writeSpy).toHaveBeenCalledWith(
        expect.stringContaining("/path/a.css:3:1\nUnsupported at-rule is ignored"),
      );
      expect(writeSpy).toHaveBeenCalledWith(expect.stringContaining('"atRule": "@font-face"'));
    });

    it("prints errors with the file path", () => {
      Logger.logError("Something broke", "/path/a.css");
      expect(writeSpy).toHaveBeenCalledWith(expect.stringContaining("/path/a.css\nSomething broke"));
    });

    it("flushWarnings returns the collected warnings and clears them", () => {
      Logger.logWarnings(
        [{ severity: "info", type: "Selector list is split across several functions", loc: null }],
        "/path/a.css",
      );
      const flushed = Logger.flushWarnings();
      expect(flushed).toEqual([
        {
          severity: "info",
          type: "Selector list is split across several functions",
          loc: null,
          filePath: "/path/a.css",
        },
      ]);
      expect(Logger.createReport().getWarnings()).toEqual([]);
    });
  });

  describe("LoggerReport.print()", () => {
    it("prints nothing without warnings", () => {
      new LoggerReport([]).print();
      expect(writeSpy).not.toHaveBeenCalled();
    });

    it("prints the summary", () => {
      new LoggerReport([
        {
          severity: "warning",
          type: "Empty rule is skipped",
          loc: null,
          filePath: "/path/a.css",
        },
      ]).print();
      expect(writeSpy).toHaveBeenCalledWith(expect.stringContaining("Warning Summary"));
    });
  });
});
