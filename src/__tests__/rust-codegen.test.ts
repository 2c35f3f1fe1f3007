import { describe, it, expect } from "vitest";
import {
  humanize,
  rawStringHashCount,
  renderModFile,
  renderModuleFile,
  renderSingleFile,
  renderStyleFunction,
} from "../internal/rust-codegen.js";
import { isValidRustIdentifier, sanitizeRustIdentifier } from "../internal/rust-identifiers.js";

describe("renderStyleFunction", () => {
  it("wraps the style text in a raw string", () => {
    expect(renderStyleFunction("button", "{\n    display: flex;\n}")).toBe(
      [
        "/// Button styles",
        "pub fn button() -> Style {",
        "    Style::new(",
        '        r#"',
        "        {",
        "            display: flex;",
        "        }",
        '    "#,',
        "    )",
        '    .expect("Failed to create button styles")',
        "}",
      ].join("\n"),
    );
  });

  it("adds hashes when the text contains a raw string terminator", () => {
    const source = renderStyleFunction("badge", '&::after {\n    content: "#";\n}');
    expect(source).toContain('        r##"\n');
    expect(source).toContain('    "##,\n');
  });

  it("uses the configured crate and type", () => {
    const source = renderStyleFunction("card", "{\n    margin: 0;\n}", {
      crate: "my_css",
      styleType: "Sheet",
    });
    expect(source).toContain("pub fn card() -> Sheet {");
    expect(source).toContain("    Sheet::new(");
    expect(renderSingleFile([source], { crate: "my_css", styleType: "Sheet" })).toContain(
      "use my_css::Sheet;\n",
    );
  });
});

describe("rawStringHashCount", () => {
  it.each([
    ["color: red;", 1],
    ['content: "#";', 2],
    ['content: "##";', 3],
    ['content: "a#"; content: "#b";', 2],
  ])("%j needs %i hash(es)", (text, count) => {
    expect(rawStringHashCount(text)).toBe(count);
  });
});

describe("module files", () => {
  it("renders a module file with a header and its functions", () => {
    expect(renderModuleFile("button", ["fn a", "fn b"])).toBe(
      "//! Button component styles\n\nuse stylist::Style;\n\nfn a\n\nfn b\n",
    );
    expect(renderModuleFile("empty", [])).toBe("//! Empty component styles\n\nuse stylist::Style;\n");
  });

  it("renders mod.rs with sorted declarations and re-exports", () => {
    expect(renderModFile(["card", "button"])).toBe(
      [
        "//! Style modules",
        "",
        "pub mod button;",
        "pub mod card;",
        "",
        "// Re-export all component styles",
        "pub use button::*;",
        "pub use card::*;",
        "",
      ].join("\n"),
    );
  });

  it("humanizes identifiers for doc comments", () => {
    expect(humanize("flex_center")).toBe("Flex Center");
    expect(humanize("animation_fade_in")).toBe("Animation Fade In");
  });
});

describe("rust identifiers", () => {
  it.each([
    ["btn-primary", "btn_primary"],
    ["2col", "style_2col"],
    ["type", "type_style"],
    ["--", "style"],
    ["a--b", "a_b"],
  ])("sanitizes %j to %j", (raw, identifier) => {
    expect(sanitizeRustIdentifier(raw)).toBe(identifier);
  });

  it("rejects keywords and malformed identifiers", () => {
    expect(isValidRustIdentifier("button")).toBe(true);
    expect(isValidRustIdentifier("type")).toBe(false);
    expect(isValidRustIdentifier("_")).toBe(false);
    expect(isValidRustIdentifier("my-mod")).toBe(false);
    expect(isValidRustIdentifier("1st")).toBe(false);
  });
});
