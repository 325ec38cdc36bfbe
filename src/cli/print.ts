/**
 * Print Command Helpers
 *
 * Argument validation for the headless `print` command.
 */

/**
 * Parse a positive integer CLI argument.
 * @returns Error message or null if valid
 */
export function validateDimension(input: string): string | null {
  if (!/^\d+$/.test(input.trim())) {
    return "Must be a number";
  }
  if (parseInt(input, 10) < 1) {
    return "Must be at least 1";
  }
  return null;
}
