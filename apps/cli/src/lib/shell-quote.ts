/**
 * POSIX shell quoting for arguments embedded in remote command strings.
 *
 * Strings made only of safe characters pass through untouched; anything
 * else is wrapped in single quotes, with embedded single quotes written
 * as '\'' : can't -> 'can'\''t'
 */
const SAFE_CHARS = /^[a-zA-Z0-9_@%+=:,./-]+$/;

export function shellQuote(s: string): string {
  if (s === "") return "''";
  if (SAFE_CHARS.test(s)) return s;
  return "'" + s.replaceAll("'", "'\\''") + "'";
}

/**
 * Double-quoted form for values the remote shell should still expand
 * `$VAR` in. Backslash, double quote and backtick are escaped.
 */
export function doubleQuote(s: string): string {
  return `"${s.replace(/[\\"`]/g, (c) => `\\${c}`)}"`;
}
