/**
 * runConvert against temporary directories.
 * Core concepts: default output paths, component layout, dry runs and mapping files.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger } from "../internal/logger.js";
import { runConvert } from "../run.js";

describe("runConvert", () => {
  let tmp: string;

  beforeEach(async () => {
    Logger._clearCollected();
    vi.restoreAllMocks();
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    tmp = await mkdtemp(join(tmpdir(), "css-to-stylist-run-"));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("writes <name>.rs next to a single input file", async () => {
    const input = join(tmp, "app.css");
    await writeFile(input, ".btn { padding: 8px; }\n");

    const result = await runConvert({ input });

    expect(result).toMatchObject({ converted: 1, failed: 0, errors: [], warnings: [] });
    expect(result.written).toEqual([join(tmp, "app.rs")]);
    const contents = await readFile(join(tmp, "app.rs"), "utf-8");
    expect(contents).toContain("pub fn btn() -> Style {");
    expect(contents).toContain("            padding: var(--spacing-sm);");
  });

  it("writes component modules into the output directory", async () => {
    const input = join(tmp, "components.css");
    await writeFile(input, ".btn { color: red; }\n.card { margin: 0; }\n");
    const output = join(tmp, "out");

    const result = await runConvert({ input, output, groupByComponent: true });

    expect(result.written).toEqual([
      join(output, "button.rs"),
      join(output, "card.rs"),
      join(output, "mod.rs"),
    ]);
    expect((await readdir(output)).sort()).toEqual(["button.rs", "card.rs", "mod.rs"]);
  });

  it("converts every .css file of a directory", async () => {
    await writeFile(join(tmp, "b.css"), ".b { color: red; }");
    await writeFile(join(tmp, "a.css"), ".a { color: red; }");
    await writeFile(join(tmp, "notes.txt"), "not css");

    const result = await runConvert({ input: tmp });

    expect(result.converted).toBe(2);
    expect(result.written).toEqual([join(tmp, "rust_styles", "a.rs"), join(tmp, "rust_styles", "b.rs")]);
  });

  it("warns about a directory without stylesheets", async () => {
    const empty = join(tmp, "empty");
    await mkdir(empty);

    const result = await runConvert({ input: empty });

    expect(result.converted).toBe(0);
    expect(result.warnings.map((w) => w.type)).toEqual(["No CSS files found in directory"]);
  });

  it("does not write files in a dry run", async () => {
    const input = join(tmp, "app.css");
    await writeFile(input, ".btn { color: red; }");

    const result = await runConvert({ input, dryRun: true });

    expect(result.written).toEqual([join(tmp, "app.rs")]);
    expect(await readdir(tmp)).toEqual(["app.css"]);
  });

  it("merges a mappings file over the defaults", async () => {
    const input = join(tmp, "app.css");
    await writeFile(input, ".link { color: #ffffff; }");
    const mappingsFile = join(tmp, "tokens.json");
    await writeFile(mappingsFile, JSON.stringify({ colors: { "#ffffff": "var(--white)" } }));

    await runConvert({ input, mappingsFile });

    expect(await readFile(join(tmp, "app.rs"), "utf-8")).toContain("color: var(--white);");
  });

  it("continues with the default tables when the mappings file is missing", async () => {
    const input = join(tmp, "app.css");
    await writeFile(input, ".link { color: #ffffff; }");

    const result = await runConvert({ input, mappingsFile: join(tmp, "missing.json") });

    expect(result.warnings.map((w) => w.type)).toEqual(["Custom value mappings could not be loaded"]);
    expect(await readFile(join(tmp, "app.rs"), "utf-8")).toContain(
      "color: var(--color-background);",
    );
  });

  it("reports files whose output was aborted", async () => {
    const input = join(tmp, "app.css");
    await writeFile(input, ".animation-spin { color: red; }\n@keyframes spin { to { opacity: 1; } }");

    const result = await runConvert({ input });

    expect(result).toMatchObject({ converted: 0, failed: 1, written: [] });
    expect(result.errors.map((e) => [e.filePath, e.error.code])).toEqual([[input, "NameCollision"]]);
    expect(await readdir(tmp)).toEqual(["app.css"]);
  });
});
