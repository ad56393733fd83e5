/**
 * Utility functions for the CLI
 * Extracted for testability
 */

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 * Skips values that follow flags (e.g., in '--file -h', '-h' is a filename).
 *
 * @param args - Command line arguments array
 * @param valueFlags - Flags that take values (to skip their values)
 * @returns True if --help or -h is present at a flag position
 */
export function hasHelpFlag(args: string[], valueFlags: readonly string[] = []): boolean {
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i++;
      continue;
    }
    if (args[i] === '--help' || args[i] === '-h') {
      return true;
    }
  }
  return false;
}

/**
 * Parse a whole-number argument value. Accepts an optional leading minus sign.
 *
 * @param value - Raw argument value
 * @returns The integer, or null if the value is not a plain integer
 *
 * @example
 * parseIntegerArg('250') // 250
 * parseIntegerArg('2.5') // null
 * parseIntegerArg('10k') // null
 */
export function parseIntegerArg(value: string): number | null {
  if (!/^-?\d+$/.test(value)) {
    return null;
  }
  return parseInt(value, 10);
}

/**
 * Return the values in first-seen order without repeats.
 */
export function uniqueInOrder<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @param url - URL string to validate
 * @returns Object with isValid boolean and error message if invalid
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: 'URL is required' };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return { isValid: false, error: 'URL must use http or https protocol' };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: 'Invalid URL format' };
  }
}

/**
 * Extract the base URL (protocol + host) from a full URL.
 * Any path or trailing slash is dropped so relative links can be appended.
 *
 * @example
 * getBaseUrl('https://example.com/path/to/page') // 'https://example.com'
 * getBaseUrl('http://localhost:3000/') // 'http://localhost:3000'
 */
export function getBaseUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
}
