export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Map<string, string | true>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [command = 'help', ...rest] = argv;
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg.startsWith('--')) {
      const next = rest[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags.set(arg.slice(2), next);
        i++;
      } else {
        flags.set(arg.slice(2), true);
      }
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

export function flagString(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

export interface ConvertArgs {
  documentId: string | undefined;
  /** Only set with --engine; otherwise the converter picks the remote engine */
  engineName: string | undefined;
  outDir: string;
  json: boolean;
}

export function convertArgs(args: ParsedArgs): ConvertArgs {
  return {
    documentId: args.positional[0],
    engineName: flagString(args, 'engine'),
    outDir: flagString(args, 'out') ?? 'output',
    json: args.flags.has('json'),
  };
}
