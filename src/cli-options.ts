/**
 * CLI Options Parser
 * Handles command-line argument parsing and resolves the invocation settings
 */

import os from 'os';
import path from 'path';
import { ArgumentsError } from './errors.js';
import { COMMANDS } from './types.js';
import type { CliOptionsData, CommandName, Settings } from './types.js';

export const DEFAULT_STORAGE_PATH = '~/.webmark';
const STORAGE_PATH_ENV = 'WEBMARK_STORAGE_PATH';

const ARG_COUNTS: Record<CommandName, number> = {
  list: 0,
  add: 3,
  rm: 1,
  open: 1
};

const COMMAND_USAGE: Record<CommandName, string> = {
  list: 'To list bookmarks use following command:\n\twebmark list',
  add: 'To add bookmark use following command:\n\twebmark add {code} {url} {description}',
  rm: 'To remove bookmark use following command:\n\twebmark rm {code}',
  open: 'To open bookmark use following command:\n\twebmark open {code}'
};

const NEGATIVE_NUMBER = /^-\d+$|^-\d*\.\d+$/;

/** Dash-led values that are text rather than flags, such as "- note" or -5 */
function isPositional(arg: string): boolean {
  return !arg.startsWith('-') || arg === '-' || arg.includes(' ') || NEGATIVE_NUMBER.test(arg);
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

export class CliOptions implements CliOptionsData {
  command: CommandName | null = null;
  commandArgs: string[] = [];
  force: boolean = false;
  help: boolean = false;
  storagePath: string | null = null;
  errors: string[] = [];

  constructor(argv: string[] = process.argv.slice(2)) {
    this._parse(argv);
  }

  private _parse(argv: string[]): void {
    const args: string[] = [];
    let optionsEnded = false;

    // Separate flags from positional arguments
    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];

      if (optionsEnded || isPositional(arg)) {
        args.push(arg);
      } else if (arg === '--') {
        optionsEnded = true;
      } else if (arg === '-f' || arg === '--force') {
        this.force = true;
      } else if (arg === '-h' || arg === '--help') {
        this.help = true;
      } else if (arg === '--storage-path') {
        const value = argv[i + 1];
        if (value === undefined || value === '' || !isPositional(value)) {
          this.errors.push('--storage-path requires a path');
        } else {
          this.storagePath = value;
          i++;
        }
      } else if (arg.startsWith('--storage-path=')) {
        const value = arg.slice('--storage-path='.length);
        if (value === '') {
          this.errors.push('--storage-path requires a path');
        } else {
          this.storagePath = value;
        }
      } else {
        this.errors.push(`Unknown flag: ${arg}`);
      }
    }

    if (this.help) return;

    if (args.length === 0) {
      this.errors.push(`Expected a command: ${COMMANDS.join(', ')}`);
      return;
    }

    const [name, ...rest] = args;
    if (!isCommand(name)) {
      this.errors.push(`Unknown command: ${name} (choose from ${COMMANDS.join(', ')})`);
      return;
    }

    this.command = name;
    this.commandArgs = rest;

    if (rest.length !== ARG_COUNTS[name]) {
      this.errors.push(COMMAND_USAGE[name]);
    }
  }

  isValid(): boolean {
    return this.errors.length === 0;
  }

  getErrorMessage(): string | null {
    if (this.errors.length === 0) {
      return null;
    }

    return this.errors.join('\n');
  }

  getUsageMessage(): string {
    return `
webmark - Keep short codes for the URLs you visit

Usage:
  webmark [options] list
  webmark [options] add <code> <url> <description> [-f]
  webmark [options] rm <code>
  webmark [options] open <code>

Options:
  --help, -h              Show this help
  --storage-path <path>   Bookmarks file (default: ${DEFAULT_STORAGE_PATH})
  -f, --force             Overwrite an existing code when adding

Environment:
  ${STORAGE_PATH_ENV}    Bookmarks file, used when --storage-path is not given

Examples:
  webmark add gh https://github.com "Code hosting"
  webmark open gh
  webmark rm gh
`;
  }
}

/**
 * Build the settings for this invocation.
 * The storage path comes from --storage-path, then the environment, then the default.
 */
export function loadSettings(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Settings {
  const message = options.getErrorMessage();
  if (message !== null || options.command === null) {
    throw new ArgumentsError(message ?? options.getUsageMessage());
  }

  const fromEnv = env[STORAGE_PATH_ENV];
  const storagePath = options.storagePath ?? (fromEnv ? fromEnv : DEFAULT_STORAGE_PATH);

  return {
    command: options.command,
    commandArgs: options.commandArgs,
    force: options.force,
    storagePath: expandHome(storagePath)
  };
}
