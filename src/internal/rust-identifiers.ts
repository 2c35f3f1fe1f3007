/**
 * Rust identifier checks and sanitizing for generated function and module names.
 */

const RUST_KEYWORDS = new Set([
  "as", "async", "await", "break", "const", "continue", "crate", "dyn", "else", "enum",
  "extern", "false", "fn", "for", "if", "impl", "in", "let", "loop", "match", "mod",
  "move", "mut", "pub", "ref", "return", "self", "Self", "static", "struct", "super",
  "trait", "true", "type", "unsafe", "use", "where", "while", "yield",
]);

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function isRustKeyword(name: string): boolean {
  return RUST_KEYWORDS.has(name);
}

/** A plain (non-raw) Rust identifier that is not a keyword. */
export function isValidRustIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && name !== "_" && !isRustKeyword(name);
}

/**
 * Converts arbitrary text to a snake_case-ish Rust identifier.
 * @example sanitizeRustIdentifier("btn-primary") => "btn_primary"
 * @example sanitizeRustIdentifier("2col") => "style_2col"
 * @example sanitizeRustIdentifier("type") => "type_style"
 */
export function sanitizeRustIdentifier(name: string): string {
  let sanitized = name
    .replace(/[^a-zA-Z0-9_]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!sanitized) {
    return "style";
  }
  if (/^[0-9]/.test(sanitized)) {
    sanitized = `style_${sanitized}`;
  }
  if (isRustKeyword(sanitized)) {
    sanitized = `${sanitized}_style`;
  }
  return sanitized;
}
