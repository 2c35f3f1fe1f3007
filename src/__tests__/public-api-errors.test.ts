import { describe, it, expect } from "vitest";
import { defineOptions, resolveOptions } from "../config.js";
import { assertValidOptions, describeValue } from "../internal/public-api-validation.js";
import { runConvert } from "../run.js";

describe("public API runtime validation (DX)", () => {
  it("assertValidOptions: rejects non-objects with the expected shape", () => {
    expect(() => assertValidOptions(null, "resolveOptions(options)")).toThrowError(
      /resolveOptions\(options\): expected an options object/,
    );
    expect(() => assertValidOptions([], "resolveOptions(options)")).toThrowError(
      /Received: Array\(0\)/,
    );
    expect(() => assertValidOptions("x", "resolveOptions(options)")).toThrowError(
      /groupByComponent\?: boolean/,
    );
  });

  it("assertValidOptions: names unknown options", () => {
    expect(() => assertValidOptions({ grouping: true }, "defineOptions(options)")).toThrowError(
      /unknown option\(s\) "grouping"/,
    );
  });

  it("assertValidOptions: checks option types", () => {
    expect(() => assertValidOptions({ groupByComponent: "yes" }, "x")).toThrowError(
      'x: groupByComponent must be a boolean.\nReceived: groupByComponent="yes"',
    );
    expect(() => assertValidOptions({ mappings: [] }, "x")).toThrowError(
      /mappings must be an object of category tables/,
    );
    expect(() => assertValidOptions({ mappingsFile: " " }, "x")).toThrowError(
      /mappingsFile must be a non-empty string/,
    );
    expect(() => assertValidOptions({ target: { crate: "my-crate" } }, "x")).toThrowError(
      /target.crate must be a Rust path/,
    );
    expect(() => assertValidOptions({ indent: "" }, "x")).toThrowError(
      /indent must be a non-empty string of spaces or tabs/,
    );
    expect(() =>
      assertValidOptions({ target: { crate: "stylist", styleType: "Style" }, indent: "\t" }, "x"),
    ).not.toThrow();
  });

  it("defineOptions: validates mapping tables", () => {
    expect(defineOptions({ groupByComponent: true })).toEqual({ groupByComponent: true });
    expect(() => defineOptions(JSON.parse('{ "mappings": { "colors": { "red": 1 } } }'))).toThrowError(
      /"colors.red" must be a string/,
    );
  });

  it("resolveOptions: fills in the defaults", () => {
    const resolved = resolveOptions();
    expect(resolved).toMatchObject({
      groupByComponent: false,
      extractVariants: true,
      includeUtilities: false,
      applyMappings: true,
      target: { crate: "stylist", styleType: "Style" },
      indent: "    ",
      verifyOutput: false,
    });
    expect(resolved.mappings.colors?.["#007bff"]).toBe("var(--color-primary)");
    expect(resolveOptions({ target: { styleType: "Sheet" } }).target).toEqual({
      crate: "stylist",
      styleType: "Sheet",
    });
  });

  it("resolveOptions: refuses an unloaded mappingsFile", () => {
    expect(() => resolveOptions({ mappingsFile: "tokens.json" })).toThrowError(
      /mappingsFile is only read by runConvert and the CLI/,
    );
  });

  it("runConvert: throws a helpful message when options are missing", async () => {
    await expect(runConvert(JSON.parse("null"))).rejects.toThrowError(
      /runConvert\(options\) was called with an invalid argument/,
    );
  });

  it("runConvert: throws a helpful message when input is missing", async () => {
    await expect(runConvert(JSON.parse('{ "input": "" }'))).rejects.toThrowError(
      /`input` is required/,
    );
  });

  it("runConvert: rejects invalid conversion options before reading files", async () => {
    await expect(
      runConvert(JSON.parse('{ "input": "missing.css", "verifyOutput": 1 }')),
    ).rejects.toThrowError(/runConvert\(options\): verifyOutput must be a boolean/);
  });

  it("describeValue: summarizes values for messages", () => {
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue("a")).toBe('"a"');
    expect(describeValue({ a: 1, b: 2 })).toBe("Object { a, b }");
    expect(describeValue(new Map())).toBe("Map");
    expect(describeValue(() => 1)).toBe("[Function]");
  });
});
