/**
 * CLI flag parsing.
 *
 * Supports both --flag=value and --flag value forms. For --flag value,
 * argv[i+1] is consumed only when it does not start with "--".
 */

export function getFlag(name: string, argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg.startsWith(`--${name}=`)) return arg.slice(`--${name}=`.length);
    if (arg === `--${name}`) {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) return next;
      return ''; // boolean flag
    }
  }
  return undefined;
}

export function hasFlag(name: string, argv: readonly string[]): boolean {
  return argv.some((arg) => arg === `--${name}` || arg.startsWith(`--${name}=`));
}

/** Arguments that are neither flags nor the value of a `--flag value` pair. */
export function getPositionals(argv: readonly string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = argv[i + 1];
      if (!arg.includes('=') && next !== undefined && !next.startsWith('--')) i++;
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}
