import matter from "gray-matter";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

// YAML 1.2 writer: date-like strings such as 2026-10-19 stay unquoted
const engines = {
  yaml: {
    parse: (input: string): object => {
      const data: unknown = parseYaml(input);
      return typeof data === "object" && data !== null ? data : {};
    },
    stringify: (data: object): string => stringifyYaml(data),
  },
};

/**
 * Prepends a frontmatter block to `body`, separated from it by a blank line.
 */
export function withFrontmatter(body: string, data: Record<string, string>): string {
  return matter.stringify(`\n${body}`, data, { engines });
}
