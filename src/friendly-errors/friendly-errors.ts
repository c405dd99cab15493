/**
 * Friendly Errors
 *
 * Settings files and settings values are user input. Their failures come
 * back as values with the file, the key and the position spelled out.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, SettingsFileSchema, ".bundle/config");
 * if (!result.success) {
 *   logger.warn(formatFriendlyError(result.error));
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation" | "settings";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

/**
 * "BUNDLE_TIMEOUT: Expected number, received string"
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

// First line of the parser message, prefixed with its position when known
function formatYamlError(error: YAMLParseError): string {
  const summary = error.message.split("\n")[0] ?? error.message;
  const start = error.linePos?.[0];
  if (!start || summary.includes(`at line ${start.line}`)) return summary;
  return `line ${start.line}, column ${start.col}: ${summary}`;
}

/**
 * Failure of settings that parsed but do not make sense together.
 */
export function settingsError(message: string, error: ZodError): FriendlyError {
  return { type: "settings", message, details: formatZodIssues(error) };
}

/**
 * Message followed by one indented line per detail.
 */
export function formatFriendlyError(error: FriendlyError): string {
  const details = error.details ?? [];
  return [error.message, ...details.map((detail) => `  ${detail}`)].join("\n");
}

/**
 * Parse YAML and validate it. An empty document validates as `{}`,
 * the same as a settings file with every line commented out.
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const where = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (err) {
    const detail = err instanceof YAMLParseError ? formatYamlError(err) : err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: { type: "yaml", message: `Invalid YAML syntax${where}`, details: [detail] },
    };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: { type: "validation", message: `Invalid settings${where}`, details: formatZodIssues(result.error) },
    };
  }

  return { success: true, data: result.data };
}
