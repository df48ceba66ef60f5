/**
 * Minimal argv handling shared by the maintenance commands
 */

export interface ArgSpec {
  /** Boolean switches, e.g. `--dry-run` */
  flags?: string[];
  /** Options that take a value, e.g. `--server` */
  options?: string[];
  /** Short aliases, e.g. `{ '-v': '--verbose' }` */
  aliases?: Record<string, string>;
}

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * Parse `argv` (without the node and script entries). Accepts both
 * `--name value` and `--name=value`.
 */
export function parseArgs(argv: string[], spec: ArgSpec): ParsedArgs {
  const flagNames = new Set(spec.flags ?? []);
  const optionNames = new Set(spec.options ?? []);
  const aliases = spec.aliases ?? {};

  const positionals: string[] = [];
  const flags = new Set<string>();
  const options = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];

    if (raw === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (!raw.startsWith('-') || raw === '-') {
      positionals.push(raw);
      continue;
    }

    const eq = raw.indexOf('=');
    const rawName = eq === -1 ? raw : raw.slice(0, eq);
    const name = aliases[rawName] ?? rawName;

    if (flagNames.has(name)) {
      if (eq !== -1) {
        throw new ArgumentError(`Option ${name} does not take a value`);
      }
      flags.add(name);
      continue;
    }

    if (optionNames.has(name)) {
      const value = eq === -1 ? argv[++i] : raw.slice(eq + 1);
      if (value === undefined || (eq === -1 && value.startsWith('--'))) {
        throw new ArgumentError(`Option ${name} requires a value`);
      }
      options.set(name, value);
      continue;
    }

    throw new ArgumentError(`Unknown option: ${raw}`);
  }

  return { positionals, flags, options };
}
