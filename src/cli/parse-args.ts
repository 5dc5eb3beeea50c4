import path from 'node:path';
import os from 'node:os';

import { z } from 'zod';

import type { ValueOf } from '../types/value-of';
import { permissionsSchema } from '../utils/get-config';

export const CLI_COMMAND = {
  HELP: 'help',
  INFO: 'info',
  LIST: 'ls',
  TOUCH: 'touch',
  MKDIR: 'mkdir',
  MOVE: 'mv',
  RENAME: 'rename',
  REMOVE_FILE: 'rm',
  REMOVE_DIRECTORY: 'rmdir',
  READ: 'cat',
  APPEND: 'append',
  WRITE: 'write',
} as const;

export type CliCommandName = ValueOf<typeof CLI_COMMAND>;

export const cliCommandSchema = z.enum(
  Object.values(CLI_COMMAND) as [CliCommandName, ...CliCommandName[]],
);

export const LIST_FILTER = {
  ALL: 'all',
  DIRECTORIES: 'directories',
  FILES: 'files',
} as const;

export type ListFilter = ValueOf<typeof LIST_FILTER>;

export type CliCommand =
  | { name: typeof CLI_COMMAND.HELP }
  | { name: typeof CLI_COMMAND.INFO; path: string }
  | {
      name: typeof CLI_COMMAND.LIST;
      path: string;
      recursive: boolean;
      showHidden: boolean;
      filter: ListFilter;
    }
  | { name: typeof CLI_COMMAND.TOUCH; path: string; force: boolean }
  | { name: typeof CLI_COMMAND.MKDIR; path: string; parents: boolean; mode: number | null }
  | { name: typeof CLI_COMMAND.MOVE; source: string; destination: string; force: boolean }
  | { name: typeof CLI_COMMAND.RENAME; path: string; newName: string; force: boolean }
  | { name: typeof CLI_COMMAND.REMOVE_FILE; path: string }
  | { name: typeof CLI_COMMAND.REMOVE_DIRECTORY; path: string; recursive: boolean }
  | { name: typeof CLI_COMMAND.READ; path: string }
  | { name: typeof CLI_COMMAND.APPEND; path: string; content: string }
  | { name: typeof CLI_COMMAND.WRITE; path: string; content: string };

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

type ParsedOptions = {
  positional: string[];
  recursive: boolean;
  all: boolean;
  dirs: boolean;
  files: boolean;
  force: boolean;
  parents: boolean;
  mode: number | null;
};

type BooleanOption = keyof Omit<ParsedOptions, 'positional' | 'mode'>;

const BOOLEAN_FLAGS = new Map<string, BooleanOption>([
  ['--recursive', 'recursive'],
  ['-r', 'recursive'],
  ['--all', 'all'],
  ['-a', 'all'],
  ['--dirs', 'dirs'],
  ['--files', 'files'],
  ['--force', 'force'],
  ['-f', 'force'],
  ['--parents', 'parents'],
  ['-p', 'parents'],
]);

export const resolveHome = (targetPath: string) => {
  if (targetPath === '~' || targetPath.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), targetPath.slice(1));
  }
  return targetPath;
};

const parseOptions = (args: string[]): ParsedOptions => {
  const parsed: ParsedOptions = {
    positional: [],
    recursive: false,
    all: false,
    dirs: false,
    files: false,
    force: false,
    parents: false,
    mode: null,
  };

  let index = 0;
  while (index < args.length) {
    const token = args[index] ?? '';
    if (token === '--mode' || token === '-m') {
      const value = args[index + 1];
      if (value === undefined) {
        throw new CliUsageError(`Missing value for ${token}`);
      }
      const mode = permissionsSchema.safeParse(value);
      if (!mode.success) {
        throw new CliUsageError(mode.error.issues[0]?.message ?? `Invalid mode "${value}"`);
      }
      parsed.mode = mode.data;
      index += 2;
      continue;
    }
    const flag = BOOLEAN_FLAGS.get(token);
    if (flag) {
      parsed[flag] = true;
      index += 1;
      continue;
    }
    // A lone "-" or anything after "--" stays positional
    if (token === '--') {
      parsed.positional.push(...args.slice(index + 1));
      break;
    }
    if (token.startsWith('-') && token !== '-') {
      throw new CliUsageError(`Unknown option ${token}`);
    }
    parsed.positional.push(token);
    index += 1;
  }

  return parsed;
};

const takePositional = (command: CliCommandName, options: ParsedOptions, names: string[]) => {
  if (options.positional.length !== names.length) {
    const expected = names.map((name) => `<${name}>`).join(' ');
    throw new CliUsageError(`Usage: fs-entry ${command} ${expected}`);
  }
  return options.positional;
};

const toListFilter = (options: ParsedOptions): ListFilter => {
  if (options.dirs && options.files) {
    throw new CliUsageError('Use either --dirs or --files, not both');
  }
  if (options.dirs) {
    return LIST_FILTER.DIRECTORIES;
  }
  return options.files ? LIST_FILTER.FILES : LIST_FILTER.ALL;
};

/**
 * Parse command line arguments (without the node and script entries).
 * @returns null when no command was given
 * @throws CliUsageError on unknown commands, unknown options or missing arguments
 */
export const parseArgs = (args: string[]): CliCommand | null => {
  const [commandToken, ...rest] = args;
  if (commandToken === undefined) {
    return null;
  }
  if (commandToken === '--help' || commandToken === '-h') {
    return { name: CLI_COMMAND.HELP };
  }

  const command = cliCommandSchema.safeParse(commandToken);
  if (!command.success) {
    throw new CliUsageError(`Unknown command ${commandToken}`);
  }

  const options = parseOptions(rest);
  const name = command.data;

  switch (name) {
    case CLI_COMMAND.HELP:
      return { name };
    case CLI_COMMAND.INFO:
    case CLI_COMMAND.READ:
    case CLI_COMMAND.REMOVE_FILE: {
      const [target = ''] = takePositional(name, options, ['path']);
      return { name, path: resolveHome(target) };
    }
    case CLI_COMMAND.LIST: {
      const [target = ''] = takePositional(name, options, ['path']);
      return {
        name,
        path: resolveHome(target),
        recursive: options.recursive,
        showHidden: options.all,
        filter: toListFilter(options),
      };
    }
    case CLI_COMMAND.TOUCH: {
      const [target = ''] = takePositional(name, options, ['path']);
      return { name, path: resolveHome(target), force: options.force };
    }
    case CLI_COMMAND.MKDIR: {
      const [target = ''] = takePositional(name, options, ['path']);
      return { name, path: resolveHome(target), parents: options.parents, mode: options.mode };
    }
    case CLI_COMMAND.MOVE: {
      const [source = '', destination = ''] = takePositional(name, options, ['source', 'destination']);
      return {
        name,
        source: resolveHome(source),
        destination: resolveHome(destination),
        force: options.force,
      };
    }
    case CLI_COMMAND.RENAME: {
      const [target = '', newName = ''] = takePositional(name, options, ['path', 'name']);
      return { name, path: resolveHome(target), newName, force: options.force };
    }
    case CLI_COMMAND.REMOVE_DIRECTORY: {
      const [target = ''] = takePositional(name, options, ['path']);
      return { name, path: resolveHome(target), recursive: options.recursive };
    }
    case CLI_COMMAND.APPEND:
    case CLI_COMMAND.WRITE: {
      const [target = '', content = ''] = takePositional(name, options, ['path', 'content']);
      return { name, path: resolveHome(target), content };
    }
  }
};
