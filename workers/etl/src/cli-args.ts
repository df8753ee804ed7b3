export const USAGE = `Usage:
  tsx workers/etl/src/cli.ts run                      Run against DATABASE_URL
  tsx workers/etl/src/cli.ts run --fixture <file>     Dry run on an in-memory warehouse
  tsx workers/etl/src/cli.ts enqueue                  Queue a run for the worker (REDIS_URL)`;

export type CliCommand =
  | { command: 'run'; fixture: string | null }
  | { command: 'enqueue' };

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  const get = (key: string) => {
    const idx = rest.indexOf(key);
    return idx >= 0 ? rest[idx + 1] : undefined;
  };

  switch (command) {
    case 'run': {
      if (!rest.includes('--fixture')) return { command: 'run', fixture: null };
      const fixture = get('--fixture');
      if (!fixture || fixture.startsWith('--')) {
        throw new Error('--fixture needs a path to a JSON dataset');
      }
      return { command: 'run', fixture };
    }
    case 'enqueue':
      return { command: 'enqueue' };
    default:
      throw new Error(command ? `Unknown command: ${command}` : 'Missing command');
  }
}
