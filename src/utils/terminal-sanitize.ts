// CSI, OSC (hyperlinks, window titles), two-byte escapes, then bare control characters.
const ESCAPE_PATTERNS = [
  /\x1B\[[0-?]*[ -/]*[@-~]/g,
  /\x1B\][^\x07\x1b]{0,10000}(\x07|\x1B\\)/g,
  /\x1B[0-9@-Z\\-_]/g,
];

const CONTROL_CHARS = /[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g;

/**
 * Strips colour codes only. Applied to tool output quoted in failure messages.
 */
export function stripAnsi(input: string): string {
  return input.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, "");
}

/**
 * Removes escape sequences and control characters so that text copied out of a
 * workspace (file names, tool output, commit subjects) cannot drive the terminal.
 */
export function sanitizeForTerminal(input: string): string {
  let sanitized = input;
  for (const pattern of ESCAPE_PATTERNS) {
    sanitized = sanitized.replace(pattern, "");
  }
  return sanitized.replace(CONTROL_CHARS, "");
}
