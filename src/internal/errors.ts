/**
 * Compile errors raised while normalizing, emitting and aggregating style sheets.
 * Core concepts: error codes, sheet attribution and node paths.
 */

export type StyleErrorCode =
  | "MissingSelector"
  | "MalformedPseudoSelector"
  | "MalformedSelector"
  | "MalformedMediaQuery"
  | "MisplacedMediaQuery"
  | "MalformedDeclaration"
  | "InvalidIR"
  | "InvalidIdentifier"
  | "NameCollision";

export class StyleCompileError extends Error {
  readonly code: StyleErrorCode;
  /** Name of the sheet the error is attributed to, `null` for module-level errors */
  readonly sheet: string | null;
  /** Node path from the root, e.g. `["root", "&:hover", "#0"]` */
  readonly path: readonly string[];

  constructor(args: {
    code: StyleErrorCode;
    detail: string;
    sheet?: string | null;
    path?: readonly string[];
  }) {
    super(formatMessage(args.code, args.detail, args.sheet ?? null, args.path ?? []));
    this.name = "StyleCompileError";
    this.code = args.code;
    this.sheet = args.sheet ?? null;
    this.path = args.path ?? [];
  }
}

export function isStyleCompileError(value: unknown): value is StyleCompileError {
  return value instanceof StyleCompileError;
}

/** Renders a node path the way error messages show it: `root > &:hover > #0`. */
export function formatNodePath(path: readonly string[]): string {
  return path.join(" > ");
}

function formatMessage(
  code: StyleErrorCode,
  detail: string,
  sheet: string | null,
  path: readonly string[],
): string {
  const where = [sheet, path.length > 0 ? `(${formatNodePath(path)})` : null]
    .filter((part): part is string => !!part)
    .join(" ");
  return where ? `[${code}] ${where}: ${detail}` : `[${code}] ${detail}`;
}
