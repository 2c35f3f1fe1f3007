import { describe, it, expect } from "vitest";
import { convertString } from "../convert.js";

const css = `
.btn { padding: 8px 16px; color: #ffffff; }
.btn:hover { opacity: 0.9; }
.btn-secondary { background: #6c757d; }
.card { border-radius: 8px; }
.card .title { font-size: 18px; }
@media (max-width: 768px) { .card { padding: 8px; } }
`;

function textOf(result: ReturnType<typeof convertString>, name: string): string | undefined {
  return result.functions.find((f) => f.name === name)?.text;
}

describe("convertString", () => {
  it("writes one function per base selector into a single file", () => {
    const result = convertString(css, { applyMappings: false });

    expect(result.errors).toEqual([]);
    expect(result.files.map((f) => f.path)).toEqual(["styles.rs"]);
    expect(result.functions.map((f) => `${f.module}::${f.name}`)).toEqual([
      "styles::btn",
      "styles::btn_secondary",
      "styles::card",
    ]);
    expect(textOf(result, "btn")).toBe(
      "{\n    padding: 8px 16px;\n    color: #ffffff;\n}\n&:hover {\n    opacity: 0.9;\n}",
    );
    expect(textOf(result, "card")).toBe(
      [
        "{",
        "    border-radius: 8px;",
        "}",
        "& .title {",
        "    font-size: 18px;",
        "}",
        "@media (max-width: 768px) {",
        "    & {",
        "        padding: 8px;",
        "    }",
        "}",
      ].join("\n"),
    );
    expect(result.files[0]?.contents).toContain("pub fn btn_secondary() -> Style {");
  });

  it("maps values to design tokens by default", () => {
    const result = convertString(css);
    expect(textOf(result, "btn")).toBe(
      "{\n    padding: 8px 16px;\n    color: var(--color-background);\n}\n&:hover {\n    opacity: 0.9;\n}",
    );
    expect(textOf(result, "btn_secondary")).toBe(
      "{\n    background: var(--color-text-secondary);\n}",
    );
    expect(textOf(result, "card")).toContain("    border-radius: var(--border-radius-md);");
    expect(textOf(result, "card")).toContain("        padding: var(--spacing-sm);");
  });

  it("applies custom mappings over the defaults", () => {
    const result = convertString(".link { color: #ffffff; }", {
      mappings: { colors: { "#ffffff": "var(--white)" } },
    });
    expect(textOf(result, "link")).toBe("{\n    color: var(--white);\n}");
  });

  it("groups functions into component modules", () => {
    const result = convertString(
      `${css}\n@keyframes spin { from { transform: rotate(0deg); } to { transform: rotate(360deg); } }`,
      { groupByComponent: true, applyMappings: false },
    );

    expect(result.errors).toEqual([]);
    expect(result.files.map((f) => f.path)).toEqual([
      "button.rs",
      "card.rs",
      "animations.rs",
      "mod.rs",
    ]);
    expect(result.files.find((f) => f.path === "mod.rs")?.contents).toContain(
      "pub mod animations;\npub mod button;\npub mod card;\n",
    );
    expect(textOf(result, "animation_spin")).toBe(
      [
        "@keyframes spin {",
        "    from {",
        "        transform: rotate(0deg);",
        "    }",
        "    to {",
        "        transform: rotate(360deg);",
        "    }",
        "}",
      ].join("\n"),
    );
  });

  it("names functions by full class name without variant extraction", () => {
    const result = convertString(".btn-outline-primary { color: red; } .btn-outline { color: blue; }", {
      extractVariants: false,
    });
    expect(result.functions.map((f) => f.name)).toEqual(["btn_outline_primary", "btn_outline"]);

    const merged = convertString(".btn-outline-primary { color: red; } .btn-outline { color: blue; }");
    expect(merged.functions.map((f) => f.name)).toEqual(["btn_outline"]);
    expect(textOf(merged, "btn_outline")).toBe("{\n    color: red;\n    color: blue;\n}");
  });

  it("adds utilities that the stylesheet does not define", () => {
    const result = convertString(".hidden { visibility: hidden; }", {
      includeUtilities: true,
      groupByComponent: true,
    });
    expect(result.errors).toEqual([]);
    expect(result.functions.map((f) => `${f.module}::${f.name}`)).toEqual([
      "hidden::hidden",
      "utils::flex_center",
      "utils::flex_column",
      "utils::flex_row",
      "utils::absolute_center",
      "utils::full_width",
      "utils::full_height",
      "utils::visible",
    ]);
    expect(textOf(result, "full_width")).toBe("{\n    width: 100%;\n}");
  });

  it("skips universal selectors with a warning", () => {
    const result = convertString("* { margin: 0; }");
    expect(result.functions).toEqual([]);
    expect(result.warnings.map((w) => w.type)).toEqual([
      "Universal selectors (`*`) are currently unsupported",
    ]);
  });

  it("skips rules under a media query that starts with a media type", () => {
    const result = convertString(".btn { margin: 0; }\n@media print { .btn { display: none; } }", {
      applyMappings: false,
    });
    expect(result.errors).toEqual([]);
    expect(textOf(result, "btn")).toBe("{\n    margin: 0;\n}");
    expect(result.warnings.map((w) => w.type)).toEqual([
      "Media query without a leading `(feature)` is skipped",
    ]);
  });

  it("keeps values named like Object.prototype members", () => {
    const result = convertString(".title { font-family: constructor; color: toString; }");
    expect(result.errors).toEqual([]);
    expect(textOf(result, "title")).toBe("{\n    font-family: constructor;\n    color: toString;\n}");
  });

  it("aborts on names generated twice", () => {
    const result = convertString(
      ".animation-spin { color: red; }\n@keyframes spin { to { opacity: 1; } }",
    );
    expect(result.files).toEqual([]);
    expect(result.errors.map((e) => e.code)).toEqual(["NameCollision"]);
  });

  it("passes verification of its own output", () => {
    const result = convertString(css, { verifyOutput: true });
    expect(result.errors).toEqual([]);
    expect(result.functions).toHaveLength(3);
  });

  it("uses the requested file name and target", () => {
    const result = convertString(
      ".app { margin: 0; }",
      { target: { crate: "my_css", styleType: "Sheet" } },
      "app.rs",
    );
    expect(result.files.map((f) => f.path)).toEqual(["app.rs"]);
    expect(result.files[0]?.contents).toContain("use my_css::Sheet;\n");
    expect(result.files[0]?.contents).toContain("pub fn app() -> Sheet {");
  });
});
