/**
 * Quote a value for a POSIX shell command line.
 * Plain path-like values pass through unchanged.
 */
export function shellQuote(arg: string): string {
  if (/^[a-zA-Z0-9_./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\"'\"'")}'`;
}
