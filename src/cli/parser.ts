import { DocPublishError } from '../core/error-codes.js';
import type { CommandName, EventSource, ParsedCommand } from './types.js';

type FlagKind = 'value' | 'switch';

const eventFlags = ['event', 'ref', 'head-ref', 'sha', 'repository', 'server-url'];

function valueFlags(names: string[]): Record<string, FlagKind> {
  return Object.fromEntries(names.map((name): [string, FlagKind] => [name, 'value']));
}

const commandFlags: Record<CommandName, Record<string, FlagKind>> = {
  plan: { ...valueFlags(eventFlags), 'from-env': 'switch' },
  run: { ...valueFlags([...eventFlags, 'workspace']), 'from-env': 'switch', 'dry-run': 'switch' },
  status: valueFlags(['job-id'])
};

type Flags = Map<string, string | boolean>;

function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(commandFlags, value);
}

/** Accepts `--name value`, `--name=value` and bare switches. */
function parseFlags(tokens: string[], known: Record<string, FlagKind>): Flags {
  const flags: Flags = new Map();
  const queue = [...tokens];

  for (let token = queue.shift(); token !== undefined; token = queue.shift()) {
    if (!token.startsWith('--')) {
      throw new DocPublishError('E_USAGE', `Unexpected token: ${token}`);
    }

    const separator = token.indexOf('=');
    const name = separator === -1 ? token.slice(2) : token.slice(2, separator);
    const kind = Object.hasOwn(known, name) ? known[name] : undefined;
    if (kind === undefined) {
      throw new DocPublishError('E_USAGE', `Unknown flag: --${name}`);
    }

    if (kind === 'switch') {
      if (separator !== -1) {
        throw new DocPublishError('E_USAGE', `--${name} does not take a value`);
      }
      flags.set(name, true);
      continue;
    }

    const value = separator === -1 ? queue.shift() : token.slice(separator + 1);
    if (!value || (separator === -1 && value.startsWith('--'))) {
      throw new DocPublishError('E_USAGE', `Missing value for --${name}`);
    }
    flags.set(name, value);
  }

  return flags;
}

function getOptional(flags: Flags, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function parseEventSource(flags: Flags): EventSource {
  const fromEnv = flags.get('from-env') === true;
  const explicit = eventFlags.filter((name) => flags.has(name));

  if (fromEnv) {
    if (explicit.length > 0) {
      throw new DocPublishError('E_USAGE', `--from-env cannot be combined with --${explicit[0]}`);
    }
    return { kind: 'env' };
  }

  const type = getOptional(flags, 'event');
  const ref = getOptional(flags, 'ref');
  if (!type || !ref) {
    throw new DocPublishError('E_USAGE', 'Either --from-env or both --event and --ref are required');
  }

  return {
    kind: 'flags',
    input: {
      type,
      ref,
      headRef: getOptional(flags, 'head-ref'),
      sha: getOptional(flags, 'sha'),
      repository: getOptional(flags, 'repository'),
      serverUrl: getOptional(flags, 'server-url')
    }
  };
}

export function parseCommand(argv: string[]): ParsedCommand {
  if (argv.length === 0) {
    throw new DocPublishError('E_USAGE', 'Missing command');
  }

  const [command, ...rest] = argv;
  if (!isCommandName(command)) {
    throw new DocPublishError('E_USAGE', `Unknown command: ${command}`);
  }

  const flags = parseFlags(rest, commandFlags[command]);

  switch (command) {
    case 'plan':
      return { command, source: parseEventSource(flags) };
    case 'run':
      return {
        command,
        source: parseEventSource(flags),
        workspace: getOptional(flags, 'workspace'),
        dryRun: flags.get('dry-run') === true
      };
    case 'status':
      return { command, jobId: getOptional(flags, 'job-id') };
  }
}
