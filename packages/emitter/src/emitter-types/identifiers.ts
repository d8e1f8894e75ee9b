/**
 * Java identifier escaping utilities
 *
 * Reserved words and literals cannot be used as identifiers in Java and
 * there is no escape syntax, so clashing names get a trailing underscore.
 */

/**
 * Reserved keywords and literals (JLS 3.9 and 3.10)
 */
const JAVA_KEYWORDS: ReadonlySet<string> = new Set([
  // Primitive types
  "boolean",
  "byte",
  "char",
  "double",
  "float",
  "int",
  "long",
  "short",
  "void",

  // Declarations
  "class",
  "enum",
  "extends",
  "implements",
  "import",
  "interface",
  "package",
  "throws",

  // Modifiers
  "abstract",
  "final",
  "native",
  "private",
  "protected",
  "public",
  "static",
  "strictfp",
  "synchronized",
  "transient",
  "volatile",

  // Statements
  "assert",
  "break",
  "case",
  "catch",
  "continue",
  "default",
  "do",
  "else",
  "finally",
  "for",
  "goto",
  "if",
  "return",
  "switch",
  "throw",
  "try",
  "while",

  // Expressions
  "instanceof",
  "new",
  "super",
  "this",
  "const",

  // Literals
  "true",
  "false",
  "null",

  "_",
]);

/**
 * Escape a Java identifier if it's a reserved word: `package` → `package_`
 */
export const escapeJavaIdentifier = (name: string): string =>
  JAVA_KEYWORDS.has(name) ? `${name}_` : name;

export const isJavaKeyword = (name: string): boolean =>
  JAVA_KEYWORDS.has(name);
