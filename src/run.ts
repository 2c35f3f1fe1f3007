import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { loadMappingsFile, type ConvertOptions } from "./config.js";
import { convertString } from "./convert.js";
import type { StyleCompileError } from "./internal/errors.js";
import { Logger, type CollectedWarning } from "./internal/logger.js";
import { assertValidOptions, describeValue } from "./internal/public-api-validation.js";
import { overlayMappings } from "./internal/value-mappings.js";

export interface RunConvertOptions extends ConvertOptions {
  /**
   * A `.css` file, or a directory whose `*.css` files are converted (not recursive)
   * @example "styles/app.css"
   */
  input: string;

  /**
   * Output file, or output directory when `groupByComponent` is set.
   * Defaults to `<name>.rs` (or `<name>/`) next to a file input and to
   * `<input>/rust_styles` for a directory input.
   */
  output?: string;

  /**
   * Dry run - don't write files
   * @default false
   */
  dryRun?: boolean;
}

export interface RunConvertResult {
  /** Input files that produced output */
  converted: number;
  /** Input files with at least one error */
  failed: number;
  /** Files written, or that would have been written in a dry run */
  written: string[];
  /** Every style error, with the input file it came from */
  errors: Array<{ filePath: string; error: StyleCompileError }>;
  /** Total time in seconds */
  timeElapsed: number;
  /** Warnings emitted during conversion */
  warnings: CollectedWarning[];
}

/**
 * Convert a stylesheet, or every stylesheet in a directory, and write the Rust files.
 *
 * @example
 * ```ts
 * import { runConvert } from "css-to-stylist";
 *
 * await runConvert({
 *   input: "styles/components.css",
 *   output: "src/styles",
 *   groupByComponent: true,
 * });
 * ```
 */
export async function runConvert(options: RunConvertOptions): Promise<RunConvertResult> {
  const started = performance.now();
  if (!options || typeof options !== "object") {
    throw new Error(
      [
        "runConvert(options) was called with an invalid argument.",
        "Expected: runConvert({ input: string, output?: string, ... })",
        `Received: ${describeValue(options)}`,
        "",
        "Example:",
        '  import { runConvert } from "css-to-stylist";',
        '  await runConvert({ input: "styles/app.css", output: "src/styles.rs" });',
      ].join("\n"),
    );
  }

  const { input, output, dryRun = false, ...convertOptions } = options;
  if (typeof input !== "string" || input.trim() === "") {
    throw new Error(
      [
        "runConvert(options): `input` is required.",
        "Expected: input: string (a .css file or a directory)",
        `Received: input=${describeValue(input)}`,
      ].join("\n"),
    );
  }
  if (output !== undefined && (typeof output !== "string" || output.trim() === "")) {
    throw new Error(
      [
        "runConvert(options): `output` must be a non-empty string.",
        `Received: output=${describeValue(output)}`,
      ].join("\n"),
    );
  }
  assertValidOptions(convertOptions, "runConvert(options)");

  const { mappingsFile, ...rest } = convertOptions;
  let stylesheetOptions: ConvertOptions = rest;
  if (mappingsFile !== undefined) {
    const loaded = await loadMappingsFile(resolve(mappingsFile));
    Logger.logWarnings(loaded.warnings, mappingsFile);
    if (loaded.mappings) {
      stylesheetOptions = { ...rest, mappings: overlayMappings(loaded.mappings, rest.mappings) };
    }
  }

  const components = stylesheetOptions.groupByComponent ?? false;
  const jobs = await planJobs(input, output, components);

  const result: RunConvertResult = {
    converted: 0,
    failed: 0,
    written: [],
    errors: [],
    timeElapsed: 0,
    warnings: [],
  };

  for (const job of jobs) {
    const css = await readFile(job.input, "utf-8");
    const conversion = convertString(
      css,
      stylesheetOptions,
      components ? undefined : basename(job.output),
    );

    Logger.logWarnings(conversion.warnings, job.input, css);
    for (const error of conversion.errors) {
      Logger.logError(error.message, job.input);
      result.errors.push({ filePath: job.input, error });
    }
    if (conversion.errors.length > 0) {
      result.failed++;
    }
    if (conversion.files.length === 0) {
      continue;
    }

    const outputDir = components ? job.output : dirname(job.output);
    for (const file of conversion.files) {
      const target = join(outputDir, file.path);
      if (!dryRun) {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, file.contents, "utf-8");
      }
      result.written.push(target);
    }
    result.converted++;
  }

  result.timeElapsed = (performance.now() - started) / 1000;
  result.warnings = Logger.flushWarnings();
  return result;
}

type ConvertJob = {
  input: string;
  /** Output file, or output directory for component modules */
  output: string;
};

async function planJobs(
  input: string,
  output: string | undefined,
  components: boolean,
): Promise<ConvertJob[]> {
  const inputStat = await stat(input);
  if (!inputStat.isDirectory()) {
    const stem = join(dirname(input), basename(input, extname(input)));
    return [{ input, output: output ?? (components ? stem : `${stem}.rs`) }];
  }

  const names = (await readdir(input)).filter((name) => name.endsWith(".css")).sort();
  if (names.length === 0) {
    Logger.logWarnings(
      [{ severity: "warning", type: "No CSS files found in directory", loc: null }],
      input,
    );
    return [];
  }
  const outputDir = output ?? join(input, "rust_styles");
  return names.map((name) => {
    const stem = join(outputDir, basename(name, ".css"));
    return { input: join(input, name), output: components ? stem : `${stem}.rs` };
  });
}
