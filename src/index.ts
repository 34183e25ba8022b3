#!/usr/bin/env node

/**
 * Checklist Manager
 *
 * Interactive command-line checklist backed by a flat text file.
 *
 * Usage:
 *   checklist                         # checklist.txt in the current directory
 *   checklist --file ~/todo.txt       # use a specific checklist file
 *   checklist --config ./my.yml       # use a specific config file
 *   checklist --verbose               # debug logging
 */

import * as path from 'path';
import { ChecklistStore, errorMessage } from './checklist';
import { loadConfig } from './config';
import { initLogger } from './logger';
import { ChecklistShell } from './shell';

export interface CliArgs {
  configPath?: string;
  filePath?: string;
  verbose: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const USAGE = [
  '',
  '  Checklist Manager',
  '',
  '  Options:',
  '    --file, -f <path>     Checklist file (default checklist.txt)',
  '    --config, -c <path>   Path to config YAML file (default checklist.yml)',
  '    --verbose, -v         Enable debug logging',
  '    --help, -h            Show this help',
  '',
].join('\n');

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a path`);
  }
  return value;
}

/** Parse process.argv (the first two entries are node and the script) */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { verbose: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        args.configPath = requireValue(argv, ++i, arg);
        break;
      case '--file':
      case '-f':
        args.filePath = requireValue(argv, ++i, arg);
        break;
      case '--verbose':
      case '-v':
        args.verbose = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

/** Startup: arguments, config, logger and the store. Any failure here is fatal. */
function setup(argv: string[]): ChecklistStore | null {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return null;
  }

  const config = loadConfig({ configPath: args.configPath });
  if (args.filePath) config.filePath = path.resolve(args.filePath);
  if (args.verbose) config.logging.level = 'debug';

  const log = initLogger(config.logging).child({ module: 'Main' });
  log.debug({ path: config.filePath, config: config.source ?? '(defaults)' }, 'Opening checklist');

  return new ChecklistStore(config.filePath);
}

export async function main(argv: string[] = process.argv): Promise<number> {
  let store: ChecklistStore | null;
  try {
    store = setup(argv);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return 1;
  }
  if (!store) return 0;

  const open = store;
  process.once('SIGINT', () => {
    process.stdout.write('\n');
    open.close();
    process.exit(0);
  });

  const shell = new ChecklistShell(store, process.stdout);
  try {
    await shell.run(process.stdin);
  } finally {
    store.close();
  }
  return 0;
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
}
