import { describe, it, expect } from "vitest";
import { parseStyleSource, parseStylesheet } from "../css-parser.js";
import { emitStyleSheet } from "../internal/emit-css.js";
import { normalizeMediaCondition, normalizeStyleSheet } from "../internal/normalize.js";

describe("parseStyleSource", () => {
  it("builds a sheet from nested authored CSS", () => {
    const { sheet, keyframes, warnings } = parseStyleSource(
      "card",
      `
        display: flex;
        &:hover { color: red; }
        & > .title { font-weight: bold; }
        @media (max-width: 768px) { padding: 8px; }
      `,
    );

    expect(keyframes).toEqual([]);
    expect(warnings).toEqual([]);
    expect(sheet.name).toBe("card");
    expect(sheet.root.declarations).toEqual([{ property: "display", value: "flex" }]);
    expect(sheet.root.children.map((c) => c.selector.kind)).toEqual([
      "pseudoState",
      "combinator",
      "mediaQuery",
    ]);
    expect(emitStyleSheet(normalizeStyleSheet(sheet)).text).toBe(
      [
        "{",
        "    display: flex;",
        "}",
        "&:hover {",
        "    color: red;",
        "}",
        "& > .title {",
        "    font-weight: bold;",
        "}",
        "@media (max-width: 768px) {",
        "    & {",
        "        padding: 8px;",
        "    }",
        "}",
      ].join("\n"),
    );
  });

  it("maps declaration values while parsing", () => {
    const { sheet } = parseStyleSource("link", "color: red; &:hover { color: blue; }", {
      mapValue: (property, value) => (property === "color" ? `var(--${value})` : value),
    });
    expect(sheet.root.declarations).toEqual([{ property: "color", value: "var(--red)" }]);
    expect(sheet.root.children[0]?.declarations).toEqual([
      { property: "color", value: "var(--blue)" },
    ]);
  });

  it("collects keyframes and warns about other at-rules", () => {
    const { keyframes, warnings } = parseStyleSource(
      "spinner",
      `
        @keyframes fade-in { from { opacity: 0; } to { opacity: 1; } }
        @font-face { font-family: Test; }
      `,
    );

    expect(keyframes).toEqual([
      {
        name: "fade-in",
        functionName: "animation_fade_in",
        frames: [
          { selector: "from", declarations: [{ property: "opacity", value: "0" }] },
          { selector: "to", declarations: [{ property: "opacity", value: "1" }] },
        ],
      },
    ]);
    expect(warnings.map((w) => w.type)).toEqual(["Unsupported at-rule is ignored"]);
  });

  it("rejects a space after the pseudo-state colon before stylis can drop it", () => {
    expect(() => parseStyleSource("button", "&: hover { color: red; }")).toThrowError(
      '[MalformedPseudoSelector] button (root): space after ":" in "&: hover" (line 1, column 1)',
    );
    expect(() =>
      parseStyleSource("button", "display: flex;\n&: hover {;\n  color: red;\n}"),
    ).toThrowError('space after ":" in "&: hover" (line 2, column 1)');
  });

  it("rejects a semicolon directly after an opening brace", () => {
    expect(() => parseStyleSource("button", "display:flex; &:hover {;color:red}")).toThrowError(
      '[MalformedPseudoSelector] button (root): semicolon directly after "{" (line 1, column 23)',
    );
  });

  it("ignores those patterns inside comments and strings", () => {
    const { sheet } = parseStyleSource(
      "quote",
      '/* &: hover {; */ content: "{;"; &:hover { color: red; }',
    );
    expect(sheet.root.declarations).toEqual([{ property: "content", value: '"{;"' }]);
    expect(sheet.root.children.map((c) => c.selector)).toEqual([
      { kind: "pseudoState", name: "hover" },
    ]);
  });
});

describe("parseStylesheet", () => {
  const css = `
.btn { padding: 8px 16px; }
.btn:hover { opacity: 0.9; }
.card, .panel { margin: 0; }
@media (max-width: 768px) { .btn { padding: 4px; } }
.empty { }
`;

  it("returns one rule per complete selector", () => {
    const { rules } = parseStylesheet(css);
    expect(rules.map((r) => r.selector)).toEqual([".btn", ".btn:hover", ".card", ".panel", ".btn"]);
    expect(rules[0]?.declarations).toEqual([{ property: "padding", value: "8px 16px" }]);
    expect(rules[2]?.declarations).toBe(rules[3]?.declarations);
    expect(rules.slice(0, 4).every((r) => r.media === null)).toBe(true);
  });

  it("records the media condition of rules inside @media", () => {
    const media = parseStylesheet(css).rules[4]?.media ?? "";
    expect(normalizeMediaCondition(media)).toEqual({ ok: true, condition: "(max-width: 768px)" });
  });

  it("warns about selector lists and empty rules", () => {
    const { warnings } = parseStylesheet(css);
    expect(warnings.map((w) => [w.severity, w.type])).toEqual([
      ["info", "Selector list is split across several functions"],
      ["warning", "Empty rule is skipped"],
    ]);
    expect(warnings[1]?.context).toEqual({ selector: ".empty" });
  });

  it("warns about declarations outside any rule", () => {
    const { rules, warnings } = parseStylesheet("color: red;\n.a { color: blue; }");
    expect(rules.map((r) => r.selector)).toEqual([".a"]);
    expect(warnings.map((w) => w.type)).toEqual([
      "Rule without a class, id or element selector is skipped",
    ]);
  });

  it("records source locations", () => {
    const { rules } = parseStylesheet(".a { color: red; }\n\n.b { color: blue; }");
    expect(rules.map((r) => r.loc.line)).toEqual([1, 3]);
  });
});
