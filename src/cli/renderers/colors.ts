/**
 * Terminal color utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when the stream is not a TTY.
 */

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

export const NC = '\x1b[0m';  // reset
export const RED = '\x1b[0;31m';

/** Whether ANSI color escape codes should be written to `stream`. */
export function detectColorSupport(
  env: NodeJS.ProcessEnv = process.env,
  stream: { isTTY?: boolean } = process.stdout,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['FORCE_COLOR'] !== undefined) return true;
  return stream.isTTY === true;
}

/** Wrap `text` in `code` when colors are enabled. */
export function paint(text: string, code: string, enabled: boolean): string {
  return enabled ? `${code}${text}${NC}` : text;
}
