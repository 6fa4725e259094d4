export interface ParsedArgs {
  readonly flags: ReadonlyMap<string, string>;
  readonly positional: readonly string[];
}

/** Splits `--name=value` flags from positional arguments. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const [name, ...rest] = arg.slice(2).split('=');
      flags.set(name, rest.join('=') || 'true');
    } else {
      positional.push(arg);
    }
  }
  return { flags, positional };
}
