import moment from "moment";

// strftime directive -> moment token
const DIRECTIVES: Record<string, string> = {
  Y: "YYYY",
  y: "YY",
  m: "MM",
  d: "DD",
  e: "D",
  j: "DDDD",
  H: "HH",
  I: "hh",
  M: "mm",
  S: "ss",
  p: "A",
  A: "dddd",
  a: "ddd",
  B: "MMMM",
  b: "MMM",
};

export const SUPPORTED_DIRECTIVES = [...Object.keys(DIRECTIVES), "%"].map((d) => `%${d}`);

/**
 * Returns a description of the first problem in a strftime-style pattern, or
 * null when every directive is supported.
 */
export function findPatternProblem(pattern: string): string | null {
  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] !== "%") continue;
    const directive = pattern[i + 1];
    if (directive === undefined) {
      return "pattern ends with a lone '%'";
    }
    if (directive !== "%" && !(directive in DIRECTIVES)) {
      return `unsupported directive '%${directive}'`;
    }
    i++;
  }
  return null;
}

export function toMomentFormat(pattern: string): string {
  const problem = findPatternProblem(pattern);
  if (problem) {
    throw new RangeError(`Invalid date pattern '${pattern}': ${problem}`);
  }

  let result = "";
  let literal = "";
  const flushLiteral = () => {
    if (literal) {
      result += `[${literal}]`;
      literal = "";
    }
  };

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    // Brackets would close moment's [...] escapes; write them backslash-escaped
    if (char === "[" || char === "]") {
      flushLiteral();
      result += `\\${char}`;
      continue;
    }
    if (char !== "%") {
      literal += char;
      continue;
    }
    const directive = pattern[++i];
    if (directive === "%") {
      literal += "%";
      continue;
    }
    flushLiteral();
    result += DIRECTIVES[directive];
  }
  flushLiteral();

  return result;
}

export function formatDate(date: Date, pattern: string): string {
  return moment(date).format(toMomentFormat(pattern));
}

/** Strict parse of text produced by `formatDate` with the same pattern. */
export function parseDate(text: string, pattern: string): Date | null {
  const parsed = moment(text, toMomentFormat(pattern), true);
  return parsed.isValid() ? parsed.toDate() : null;
}

export function isSameCalendarDate(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}
