/**
 * POSIX shell quoting
 *
 * ssh hands ProxyCommand to `$SHELL -c`, so every token embedded in it must
 * come back out of one round of shell parsing unchanged.
 */

const UNSAFE = /[^\w@%+=:,./-]/;

export function quoteShellArg(value: string): string {
  if (value.length === 0) {
    return "''";
  }
  if (!UNSAFE.test(value)) {
    return value;
  }
  // Close the quote, emit a double-quoted ', reopen.
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function joinShellArgs(values: readonly string[]): string {
  return values.map(quoteShellArg).join(' ');
}
