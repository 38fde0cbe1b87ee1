/**
 * Go Source Escaping Utilities
 *
 * String literal quoting and identifier sanitizing for generated Go code.
 */

/**
 * Quote a string as a Go interpreted string literal.
 * Control characters use `\xNN`; lone surrogates become U+FFFD.
 */
export function goString(value: string): string {
  let result = '"';
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    switch (char) {
      case '"':
        result += '\\"';
        break;
      case "\\":
        result += "\\\\";
        break;
      case "\n":
        result += "\\n";
        break;
      case "\r":
        result += "\\r";
        break;
      case "\t":
        result += "\\t";
        break;
      default:
        if (code < 0x20 || code === 0x7f) {
          result += `\\x${code.toString(16).padStart(2, "0")}`;
        } else if (code >= 0xd800 && code <= 0xdfff) {
          result += "\\uFFFD";
        } else {
          result += char;
        }
    }
  }
  return result + '"';
}

/** Go keywords */
export const GO_KEYWORDS: ReadonlySet<string> = new Set([
  "break", "case", "chan", "const", "continue", "default", "defer", "else",
  "fallthrough", "for", "func", "go", "goto", "if", "import", "interface",
  "map", "package", "range", "return", "select", "struct", "switch", "type",
  "var",
]);

/** Predeclared identifiers of the universe block */
export const GO_PREDECLARED: ReadonlySet<string> = new Set([
  // types
  "any", "bool", "byte", "comparable", "complex64", "complex128", "error",
  "float32", "float64", "int", "int8", "int16", "int32", "int64", "rune",
  "string", "uint", "uint8", "uint16", "uint32", "uint64", "uintptr",
  // constants and zero value
  "true", "false", "iota", "nil",
  // functions
  "append", "cap", "clear", "close", "complex", "copy", "delete", "imag",
  "len", "make", "max", "min", "new", "panic", "print", "println", "real",
  "recover",
]);

/**
 * Pick a Go identifier for a shell name: `_` is appended until the
 * candidate is neither reserved nor taken.
 */
export function sanitizeIdentifier(
  name: string,
  isUnavailable: (candidate: string) => boolean,
): string {
  let candidate = name;
  while (candidate === "_" || isUnavailable(candidate)) {
    candidate += "_";
  }
  return candidate;
}
