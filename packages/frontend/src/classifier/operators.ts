/**
 * Operator name recognition
 */

/**
 * Every token C++ accepts after the `operator` keyword
 */
const OVERLOADABLE_OPERATOR_TOKENS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "%",
  "^",
  "&",
  "|",
  "~",
  "!",
  "=",
  "<",
  ">",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "^=",
  "&=",
  "|=",
  "<<",
  ">>",
  "<<=",
  ">>=",
  "==",
  "!=",
  "<=",
  ">=",
  "<=>",
  "&&",
  "||",
  "++",
  "--",
  ",",
  "->*",
  "->",
  "()",
  "[]",
  "new",
  "delete",
  "new[]",
  "delete[]",
  "co_await",
]);

const OPERATOR_KEYWORD = "operator";

export type OperatorName = {
  readonly token: string;
  readonly isConversion: boolean;
};

const normalizeToken = (text: string): string => text.replace(/\s+/g, "");

/**
 * Recognize an operator function name.
 *
 * Returns undefined for names that only resemble operators
 * (`operatorPlus`, `operator_add`).
 */
export const parseOperatorName = (name: string): OperatorName | undefined => {
  if (!name.startsWith(OPERATOR_KEYWORD)) {
    return undefined;
  }

  const rest = name.slice(OPERATOR_KEYWORD.length);
  const token = normalizeToken(rest);

  if (OVERLOADABLE_OPERATOR_TOKENS.has(token)) {
    // `operatornew` is an identifier, `operator new` is not
    const isWordToken = /^[a-z_]/.test(token);
    if (isWordToken && !/^\s/.test(rest)) {
      return undefined;
    }
    return { token, isConversion: false };
  }

  // Conversion operator: `operator bool`, `operator std::string`
  if (/^\s+\S/.test(rest)) {
    return { token: rest.trim(), isConversion: true };
  }

  return undefined;
};
