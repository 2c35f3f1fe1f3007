import { readFileSync } from "node:fs";

type Severity = "info" | "warning" | "error";

export type WarningType =
  | "`calc()` values are passed through unchecked"
  | "Complex selector may not convert well"
  | "Custom value mappings could not be loaded"
  | "Empty rule is skipped"
  | "Media query without a leading `(feature)` is skipped"
  | "Media query without a selector rule is skipped"
  | "No CSS files found in directory"
  | "Non-standard `var()` reference"
  | "Rule without a class, id or element selector is skipped"
  | "Selector list is split across several functions"
  | "Universal selectors (`*`) are currently unsupported"
  | "Unsupported at-rule is ignored";

type Loc = { line: number; column: number };

export interface WarningLog {
  severity: Severity;
  type: WarningType;
  loc: Loc | null | undefined;
  context?: Record<string, unknown>;
}

export interface CollectedWarning extends WarningLog {
  filePath: string;
  /** Source text the warning points into, when it did not come from a file on disk */
  source?: string;
}

const LABELS: Record<Severity, { text: string; color: string }> = {
  error: { text: "Error", color: "\u001b[41m\u001b[37m" },
  warning: { text: "Warning", color: "\u001b[43m\u001b[30m" },
  info: { text: "Info", color: "\u001b[44m\u001b[37m" },
};
const SECTION_COLOR = "\u001b[36m";
const RESET_COLOR = "\u001b[0m";

/** `path`, or `path:line:column` when the location is known. */
function formatLocation(filePath: string, loc: Loc | null | undefined): string {
  return loc ? `${filePath}:${loc.line}:${loc.column}` : filePath;
}

// ────────────────────────────────────────────────────────────────────────────
// Logger
// ────────────────────────────────────────────────────────────────────────────

export class Logger {
  /** Print a file that failed to convert: "Error <path>\n<message>". */
  public static logError(message: string, filePath: string): void {
    Logger.write("error", `${filePath}\n${message}`);
  }

  /**
   * Print conversion warnings and collect them for the report.
   * `source` is the text the locations point into when `filePath` is not on disk.
   */
  public static logWarnings(warnings: WarningLog[], filePath: string, source?: string): void {
    for (const warning of warnings) {
      Logger.collected.push(
        source === undefined ? { ...warning, filePath } : { ...warning, filePath, source },
      );
      const context =
        warning.context === undefined ? "" : `\n${JSON.stringify(warning.context, null, 2)}`;
      Logger.write(
        warning.severity,
        `${formatLocation(filePath, warning.loc)}\n${warning.type}${context}`,
      );
    }
  }

  /** Return the collected warnings and start a fresh collection. */
  public static flushWarnings(): CollectedWarning[] {
    const warnings = Logger.collected;
    Logger.collected = [];
    return warnings;
  }

  public static createReport(): LoggerReport {
    return new LoggerReport([...Logger.collected]);
  }

  /** @internal - for testing only */
  public static _clearCollected(): void {
    Logger.collected = [];
  }

  private static collected: CollectedWarning[] = [];

  private static write(severity: Severity, body: string): void {
    const { text, color } = LABELS[severity];
    const label = process.stdout.isTTY ? `${color}${text}${RESET_COLOR}` : text;
    process.stdout.write(`${label} ${body.trimEnd()}\n\n`);
  }
}

// ────────────────────────────────────────────────────────────────────────────
// LoggerReport - warnings grouped by type, with source snippets
// ────────────────────────────────────────────────────────────────────────────

/** Files listed per warning type before the rest are counted. */
const MAX_FILES_PER_TYPE = 10;
/** Lines shown above and below the line a warning points at. */
const SNIPPET_RADIUS = 2;

export class LoggerReport {
  private readonly warnings: CollectedWarning[];
  private readonly fileLines = new Map<string, string[] | null>();

  constructor(warnings: CollectedWarning[]) {
    this.warnings = warnings;
  }

  getWarnings(): CollectedWarning[] {
    return this.warnings;
  }

  toString(): string {
    if (this.warnings.length === 0) {
      return "";
    }
    const groups = this.byType();
    const rule = "─".repeat(60);
    const lines = [
      "",
      rule,
      `Warning Summary: ${this.warnings.length} warning(s) in ${groups.size} category(s)`,
      rule,
    ];

    const ordered = [...groups].sort(([, a], [, b]) => b.length - a.length);
    for (const [type, warnings] of ordered) {
      lines.push("", `▸ ${type} (${warnings.length})`, "");

      // first warning per file
      const perFile = new Map<string, CollectedWarning>();
      for (const warning of warnings) {
        if (!perFile.has(warning.filePath)) perFile.set(warning.filePath, warning);
      }
      const files = [...perFile.values()];
      for (const warning of files.slice(0, MAX_FILES_PER_TYPE)) {
        lines.push(`  ${formatLocation(warning.filePath, warning.loc)}`);
        const snippet = this.snippetFor(warning);
        if (snippet) lines.push(snippet);
        lines.push("");
      }
      if (files.length > MAX_FILES_PER_TYPE) {
        lines.push(`  ... and ${files.length - MAX_FILES_PER_TYPE} more file(s)`, "");
      }
    }
    return lines.join("\n");
  }

  /** Print the report to stdout, with colored section headings. */
  print(): void {
    const output = this.toString();
    if (output) {
      const colored = output.replace(/^▸ .+$/gm, (heading) => `${SECTION_COLOR}${heading}${RESET_COLOR}`);
      process.stdout.write(`${colored}\n`);
    }
  }

  private byType(): Map<WarningType, CollectedWarning[]> {
    const groups = new Map<WarningType, CollectedWarning[]>();
    for (const warning of this.warnings) {
      const group = groups.get(warning.type);
      if (group) group.push(warning);
      else groups.set(warning.type, [warning]);
    }
    return groups;
  }

  private snippetFor(warning: CollectedWarning): string | undefined {
    if (!warning.loc) {
      return undefined;
    }
    const lines =
      warning.source !== undefined ? warning.source.split("\n") : this.linesOf(warning.filePath);
    const index = warning.loc.line - 1;
    if (!lines || index < 0 || index >= lines.length) {
      return undefined;
    }
    const first = Math.max(0, index - SNIPPET_RADIUS);
    const last = Math.min(lines.length - 1, index + SNIPPET_RADIUS);
    return lines
      .slice(first, last + 1)
      .map((text, offset) => {
        const at = first + offset;
        return `  ${at === index ? ">" : " "} ${String(at + 1).padStart(4, " ")} | ${text}`;
      })
      .join("\n");
  }

  private linesOf(filePath: string): string[] | null {
    const cached = this.fileLines.get(filePath);
    if (cached !== undefined) {
      return cached;
    }
    let lines: string[] | null;
    try {
      lines = readFileSync(filePath, "utf-8").split("\n");
    } catch {
      // unreadable files get no snippet
      lines = null;
    }
    this.fileLines.set(filePath, lines);
    return lines;
  }
}
