/**
 * Redacts credentials from strings before they are logged
 */

const REDACTED = '[REDACTED]';

const SENSITIVE_PATTERNS = [
  /x-redmine-api-key[=:\s]+[\w\-]+/gi,
  /(?<=[?&])key=[\w\-]+/gi,
  /token[=:\s]+[\w\-._]+/gi,
  /bearer\s+[\w\-._]+/gi,
  /gh[pousr]_[\w]+/gi,
  /github_pat_[\w]+/gi,
  /api[_-]?key[=:\s]+[\w\-]+/gi,
  /password[=:\s]+\S+/gi,
  /secret[=:\s]+[\w\-._]+/gi
];

/**
 * Replaces credential values with [REDACTED], keeping the name they were given under
 *
 * @param input - The string to sanitize
 * @returns The sanitized string
 */
export function sanitizeString(input: string): string {
  let sanitized = input;

  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, (match) => {
      const name = /^[^=:\s]*[=:\s]+/.exec(match);
      return name ? name[0] + REDACTED : REDACTED;
    });
  }

  return sanitized;
}

/**
 * Sanitizes an error message, accepting anything that was thrown
 */
export function sanitizeErrorMessage(error: unknown): string {
  return sanitizeString(error instanceof Error ? error.message : String(error));
}
