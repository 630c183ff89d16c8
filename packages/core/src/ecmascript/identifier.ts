/**
 * ECMAScript IdentifierName check, used by relaxed field-name encoders to
 * decide whether a property name may be written without quotes.
 *
 * @see https://tc39.es/ecma262/multipage/ecmascript-language-lexical-grammar.html
 */

/**
 * Matches a complete identifier: `$ | _ | \p{ID_Start}` followed by any
 * number of `$ | \p{ID_Continue}`. Requires the /u flag.
 */
export const IDENTIFIER_PATTERN = /^[$_\p{ID_Start}][$\p{ID_Continue}]*$/u;

/**
 * Words that cannot appear unquoted as keys in older ES3-era consumers.
 */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "import", "in", "instanceof", "new",
  "null", "return", "super", "switch", "this", "throw", "true", "try",
  "typeof", "var", "void", "while", "with",
]);

/**
 * @example
 * isValidIdentifier("foo")     // true
 * isValidIdentifier("$baz")    // true
 * isValidIdentifier("变量")     // true
 * isValidIdentifier("123abc")  // false
 * isValidIdentifier("foo-bar") // false
 */
export function isValidIdentifier(str: string): boolean {
  if (str.length === 0) return false;
  return IDENTIFIER_PATTERN.test(str);
}

export function isReservedWord(str: string): boolean {
  return RESERVED_WORDS.has(str);
}
