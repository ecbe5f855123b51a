/**
 * Verbose Output Helpers
 *
 * Formats the virt-sparsify command line for --verbose CLI output.
 * Used by VirtSparsifyExecutor to print the command to stderr
 * before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[$] ';

/**
 * ANSI SGR 90 — bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0 — reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Characters that can be printed without quoting.
 */
const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 * Returns false when stderr is piped, redirected, or non-interactive.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Control characters that plain single quotes would print literally.
 */
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

/**
 * Quote an argument for display so it can be pasted into a POSIX shell.
 *
 * Arguments with control characters use ANSI-C quoting (`$'...'`) so the
 * printed command stays on one line. Only affects what is printed;
 * arguments are passed to spawn unquoted.
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && SAFE_ARG.test(arg)) {
    return arg;
  }
  if (CONTROL_CHARS.test(arg)) {
    return `$'${arg.replace(/[\\'\x00-\x1f\x7f]/g, escapeChar)}'`;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

const NAMED_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\\': '\\\\',
  "'": "\\'",
};

/**
 * Escape one character for ANSI-C quoting.
 */
function escapeChar(char: string): string {
  return NAMED_ESCAPES[char] ?? `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
}

/**
 * Join a binary and its arguments into a printable command line.
 */
export function toCommandLine(binary: string, args: readonly string[]): string {
  return [binary, ...args].map(quoteArg).join(' ');
}

/**
 * Format a command line for verbose output.
 *
 * Produces a fenced block suitable for writing to stderr: a blank line
 * before and after, the command prefixed with `[$] `, and optionally
 * wrapped in ANSI gray (SGR 90).
 *
 * @param command - Single-line command, as built by toCommandLine
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: string, ansi: boolean): string {
  const plain = `\n${PREFIX}${command}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
