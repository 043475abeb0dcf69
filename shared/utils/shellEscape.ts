/**
 * Quoting of script paths and argument values before they are handed to a
 * shell as one command line.
 */

export type ShellFlavor = "windows" | "posix";

export function isWindows(): boolean {
  return typeof process !== "undefined" && process.platform === "win32";
}

function resolveFlavor(platform?: ShellFlavor): ShellFlavor {
  if (platform) return platform;
  return isWindows() ? "windows" : "posix";
}

/**
 * Quotes `arg` so the shell passes it through as a single literal word.
 *
 * @example
 * escapeShellArg("it's here", "posix") // 'it'\''s here'
 * escapeShellArg('say "hi"', "windows") // "say ""hi"""
 */
export function escapeShellArg(arg: string, platform?: ShellFlavor): string {
  const flavor = resolveFlavor(platform);
  if (arg === "") {
    return flavor === "windows" ? '""' : "''";
  }
  return flavor === "windows" ? escapeWindowsArg(arg) : escapePosixArg(arg);
}

// cmd.exe: double the inner quotes; trailing backslashes would escape the closing quote
function escapeWindowsArg(arg: string): string {
  let escaped = arg.replace(/"/g, '""');
  const trailing = escaped.match(/\\+$/);
  if (trailing) {
    escaped += trailing[0];
  }
  return `"${escaped}"`;
}

// Single quotes are literal in POSIX shells except for the quote itself
function escapePosixArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/** Plain words that need no quoting. */
export function isSafeUnescaped(arg: string): boolean {
  return /^[a-zA-Z0-9_\-/.]+$/.test(arg);
}

export function escapeShellArgOptional(arg: string, platform?: ShellFlavor): string {
  if (arg !== "" && isSafeUnescaped(arg)) {
    return arg;
  }
  return escapeShellArg(arg, platform);
}

/** Joins a program path and its arguments into one shell command line. */
export function buildShellCommand(
  program: string,
  args: readonly string[] = [],
  platform?: ShellFlavor
): string {
  return [program, ...args].map((part) => escapeShellArgOptional(part, platform)).join(" ");
}
