import { readFile, stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { CONVERSION_OPTIONS, loadConfigFile, type ConvertOptions } from "./config.js";
import { convertString } from "./convert.js";
import { analyzeCss, validateCss, type CssAnalysis } from "./internal/css-analysis.js";
import { Logger, LoggerReport } from "./internal/logger.js";
import { runConvert } from "./run.js";

const HELP = `
css-to-stylist - Compile CSS into Rust stylist style functions

Usage:
  css-to-stylist <command> [options]

Commands:
  convert <input>    Convert a .css file, or every .css file in a directory
  analyze <file>     Show statistics for a stylesheet
  validate <file>    Report what may not convert well
  preview <css>      Print the functions generated for a CSS string
  options            List the conversion options

Convert options:
  -o, --output <path>   Output file, or directory with --component
  -c, --config <file>   JSON options file
  --component           One module per component plus mod.rs
  --no-variants         Disable variant extraction
  --utilities           Include utility functions
  --no-mappings         Keep literal values instead of design tokens
  --mappings <file>     JSON value mappings merged over the defaults
  --verify              Re-parse the emitted style text
  --analyze             Show the analysis before converting
  --dry                 Don't write files
  --help, -h            Show this help message

Examples:
  css-to-stylist convert styles/app.css -o src/styles.rs
  css-to-stylist convert styles/ --component -o src/styles
  css-to-stylist preview ".btn { padding: 8px } .btn:hover { opacity: 0.9 }"
`;

type ParsedArgs = {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
};

const VALUE_OPTIONS: Record<string, string> = {
  "-o": "output",
  "--output": "output",
  "-c": "config",
  "--config": "config",
  "--mappings": "mappings",
};

const FLAGS = new Set([
  "--component",
  "--no-variants",
  "--utilities",
  "--no-mappings",
  "--verify",
  "--analyze",
  "--dry",
]);

/**
 * Runs one CLI invocation and resolves with its exit code.
 */
export async function runCli(args: readonly string[]): Promise<number> {
  const [command, ...rest] = args;
  if (!command || command === "--help" || command === "-h" || rest.includes("--help")) {
    console.log(HELP);
    return 0;
  }

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(rest);
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  try {
    switch (command) {
      case "convert":
        return await convertCommand(parsed);
      case "analyze":
        return await analyzeCommand(parsed);
      case "validate":
        return await validateCommand(parsed);
      case "preview":
        return previewCommand(parsed);
      case "options":
        return optionsCommand();
      default:
        console.error(`Error: unknown command "${command}"`);
        console.log(HELP);
        return 1;
    }
  } catch (e) {
    console.error(`${command} failed: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}

function parseArgs(args: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { positionals: [], flags: new Set(), values: new Map() };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    const valueName = VALUE_OPTIONS[arg];
    if (valueName) {
      const nextArg = args[i + 1];
      if (!nextArg || nextArg.startsWith("-")) {
        throw new Error(`${arg} requires a path argument`);
      }
      result.values.set(valueName, nextArg);
      i++; // Skip next arg
    } else if (FLAGS.has(arg)) {
      result.flags.add(arg);
    } else if (arg.startsWith("--")) {
      throw new Error(`unknown option ${arg}`);
    } else {
      result.positionals.push(arg);
    }
  }
  return result;
}

function requirePositional(parsed: ParsedArgs, what: string): string {
  const value = parsed.positionals[0];
  if (!value) {
    throw new Error(`missing ${what} argument`);
  }
  return value;
}

async function convertCommand(parsed: ParsedArgs): Promise<number> {
  const input = requirePositional(parsed, "<input>");
  const configPath = parsed.values.get("config");
  const fromConfig: ConvertOptions = configPath ? await loadConfigFile(resolve(configPath)) : {};

  // Flags override the config file
  const options: ConvertOptions = { ...fromConfig };
  if (parsed.flags.has("--component")) options.groupByComponent = true;
  if (parsed.flags.has("--no-variants")) options.extractVariants = false;
  if (parsed.flags.has("--utilities")) options.includeUtilities = true;
  if (parsed.flags.has("--no-mappings")) options.applyMappings = false;
  if (parsed.flags.has("--verify")) options.verifyOutput = true;
  const mappingsFile = parsed.values.get("mappings");
  if (mappingsFile) options.mappingsFile = mappingsFile;

  if (parsed.flags.has("--analyze")) {
    if ((await stat(input)).isDirectory()) {
      console.log("Analysis not supported for directories");
    } else {
      printAnalysis(input, analyzeCss(await readFile(input, "utf-8")));
    }
  }

  const result = await runConvert({
    ...options,
    input,
    output: parsed.values.get("output"),
    dryRun: parsed.flags.has("--dry"),
  });

  new LoggerReport(result.warnings).print();
  console.log(`✓ Converted ${result.converted} file(s) in ${result.timeElapsed.toFixed(2)}s`);
  if (result.failed > 0) {
    console.log(`✗ ${result.failed} file(s) had errors`);
  }
  for (const file of result.written) {
    console.log(`  ${file}`);
  }
  return result.failed > 0 ? 1 : 0;
}

async function analyzeCommand(parsed: ParsedArgs): Promise<number> {
  const file = requirePositional(parsed, "<file>");
  printAnalysis(file, analyzeCss(await readFile(file, "utf-8")));
  return 0;
}

async function validateCommand(parsed: ParsedArgs): Promise<number> {
  const file = requirePositional(parsed, "<file>");
  const issues = validateCss(await readFile(file, "utf-8"));
  if (issues.length === 0) {
    console.log("✓ CSS file is valid for conversion");
    return 0;
  }
  console.log(`Found ${issues.length} potential issues:`);
  for (const issue of issues) {
    const location = issue.loc ? `${file}:${issue.loc.line}:${issue.loc.column} ` : "";
    console.log(`  • ${location}${issue.message}`);
  }
  return 0;
}

function previewCommand(parsed: ParsedArgs): number {
  const css = requirePositional(parsed, "<css>");
  const result = convertString(css, {
    groupByComponent: parsed.flags.has("--component"),
    extractVariants: !parsed.flags.has("--no-variants"),
  });
  Logger.logWarnings(result.warnings, "<preview>", css);
  for (const error of result.errors) {
    Logger.logError(error.message, "<preview>");
  }

  if (result.functions.length === 0) {
    console.log("No functions generated from CSS");
    return result.errors.length > 0 ? 1 : 0;
  }
  console.log(`Generated ${result.functions.length} function(s):\n`);
  for (const fn of result.functions) {
    console.log(`${fn.module}::${fn.name}:`);
    console.log(fn.source);
    console.log();
  }
  return result.errors.length > 0 ? 1 : 0;
}

function optionsCommand(): number {
  console.log("Conversion options:\n");
  for (const option of CONVERSION_OPTIONS) {
    const defaultValue = String(option.default).padEnd(5);
    console.log(`  ${option.name.padEnd(18)} boolean  default: ${defaultValue}  ${option.description}`);
  }
  return 0;
}

function printAnalysis(file: string, stats: CssAnalysis): void {
  const lines = [
    `Analysis: ${basename(file)}`,
    "",
    "File Statistics:",
    `• Total Rules: ${stats.totalRules}`,
    `• Unique Selectors: ${stats.uniqueSelectors}`,
    `• Media Queries: ${stats.mediaQueries}`,
    `• Pseudo Selectors: ${stats.pseudoSelectors}`,
    `• Keyframes: ${stats.totalKeyframes}`,
    "",
    "Properties:",
    `• Total Properties: ${stats.totalProperties}`,
    `• Unique Properties: ${stats.uniqueProperties}`,
    "",
    "Value Mapping:",
    `• Mappable Values: ${stats.mappableValues}`,
    `• Coverage: ${stats.mappingCoverage}`,
    "",
    `Complexity: ${stats.complexity.difficulty}`,
    "",
    "Components Detected:",
    ...Object.entries(stats.components).map(([name, count]) => `• ${name}: ${count} rules`),
  ];
  console.log(lines.join("\n"));
}
