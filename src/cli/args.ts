export const USAGE = `Usage:
  metabase-kpi-pipeline run [--no-register] [--replace]
  metabase-kpi-pipeline register <file> [--replace] [--limit N]

Options:
  --no-register  Write the KPI document without creating saved questions
  --replace      Delete the collection's existing questions before registering
  --limit N      Register at most N KPIs from the document`;

export type Command =
  | { name: 'run'; register: boolean; replaceExisting: boolean }
  | { name: 'register'; file: string; replaceExisting: boolean; limit?: number }
  | { name: 'help'; invalid: boolean };

const BOOLEAN_FLAGS = new Set(['--no-register', '--replace', '--help']);

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const limit = Number(value);
  return limit > 0 ? limit : undefined;
}

export function parseArgs(argv: readonly string[]): Command {
  const flags = new Set<string>();
  const positional: string[] = [];
  let limit: number | undefined;
  let invalid = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--limit' || arg.startsWith('--limit=')) {
      limit = parseLimit(arg === '--limit' ? argv[++i] : arg.slice('--limit='.length));
      if (limit === undefined) invalid = true;
      flags.add('--limit');
    } else if (arg.startsWith('--')) {
      if (!BOOLEAN_FLAGS.has(arg)) invalid = true;
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  if (flags.has('--help')) return { name: 'help', invalid: false };
  if (invalid) return { name: 'help', invalid: true };

  const [command = 'run', file] = positional;
  const replaceExisting = flags.has('--replace');

  if (command === 'run' && positional.length <= 1 && !flags.has('--limit')) {
    return { name: 'run', register: !flags.has('--no-register'), replaceExisting };
  }
  if (command === 'register' && file && positional.length === 2) {
    return { name: 'register', file, replaceExisting, ...(limit !== undefined && { limit }) };
  }
  return { name: 'help', invalid: true };
}
