const SHORT_ESCAPES: Record<string, string> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

// Unpaired surrogates are escaped as well
// oxlint-disable-next-line no-control-regex
const NEEDS_ESCAPE = /["\\\u0000-\u001f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

const escapeChar = (char: string): string =>
  SHORT_ESCAPES[char] ??
  "\\u" + char.charCodeAt(0).toString(16).padStart(4, "0");

/**
 * Quote a string as a JSON string literal. `"` and `\` get backslash escapes,
 * control characters get their short form or `\u00XX`, and unpaired
 * surrogates `\uXXXX`.
 */
export function escapeJsonString(value: string): string {
  return '"' + value.replace(NEEDS_ESCAPE, escapeChar) + '"';
}
