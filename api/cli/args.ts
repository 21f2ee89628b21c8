// api/cli/args.ts

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string>;
}

/**
 * `--key value` pairs, bare `--flag` as "true", everything else positional.
 * Names listed in `booleans` never take a value.
 */
export function parseArgs(argv: readonly string[], booleans: readonly string[] = []): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) {
      positional.push(a);
      continue;
    }
    const k = a.slice(2);
    const v = argv[i + 1];
    if (v !== undefined && !v.startsWith('--') && !booleans.includes(k)) {
      flags[k] = v;
      i++;
    } else {
      flags[k] = 'true';
    }
  }
  return { positional, flags };
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const processIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
};
