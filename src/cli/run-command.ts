import type { Logger } from 'pino';

import type { PathEntry } from '../application/services/path-entry';
import { OperationError } from '../domain/errors';
import type { ValueOf } from '../types/value-of';
import { formatPermissions } from '../utils/parse-permissions';
import { formatHelp } from './help';
import { CLI_COMMAND, LIST_FILTER } from './parse-args';
import type { CliCommand } from './parse-args';

export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = ValueOf<typeof EXIT_CODE>;

export type CommandContext = {
  createEntry: (targetPath: string) => PathEntry;
  write: (text: string) => void;
  logger: Logger;
  defaultDirectoryMode: number;
};

const formatLines = (lines: string[]) => lines.map((line) => `${line}\n`).join('');

export const runCommand = (command: CliCommand, context: CommandContext): ExitCode => {
  const { createEntry, write, logger } = context;

  const report = (succeeded: boolean, message: string, details: Record<string, unknown>) => {
    if (succeeded) {
      return EXIT_CODE.SUCCESS;
    }
    logger.warn(details, message);
    return EXIT_CODE.FAILURE;
  };

  const withContent = (targetPath: string, operation: (entry: PathEntry) => void) => {
    try {
      operation(createEntry(targetPath));
      return EXIT_CODE.SUCCESS;
    } catch (error) {
      if (error instanceof OperationError) {
        logger.error({ path: targetPath, operation: error.operation }, error.message);
        return EXIT_CODE.FAILURE;
      }
      throw error;
    }
  };

  switch (command.name) {
    case CLI_COMMAND.HELP:
      write(formatHelp());
      return EXIT_CODE.SUCCESS;

    case CLI_COMMAND.INFO:
      write(`${JSON.stringify(createEntry(command.path).describe(), null, 2)}\n`);
      return EXIT_CODE.SUCCESS;

    case CLI_COMMAND.LIST: {
      const entry = createEntry(command.path);
      if (!entry.isDirectory()) {
        logger.warn({ path: command.path }, 'Not a directory');
        return EXIT_CODE.FAILURE;
      }
      const names =
        command.filter === LIST_FILTER.DIRECTORIES
          ? entry.listDirectories(command.recursive, command.showHidden)
          : command.filter === LIST_FILTER.FILES
            ? entry.listFiles(command.recursive, command.showHidden)
            : entry.listAll(command.recursive, command.showHidden);
      write(formatLines(names));
      return EXIT_CODE.SUCCESS;
    }

    case CLI_COMMAND.TOUCH:
      return report(createEntry(command.path).makeFile(command.force), 'File not created', {
        path: command.path,
        force: command.force,
      });

    case CLI_COMMAND.MKDIR: {
      const mode = command.mode ?? context.defaultDirectoryMode;
      return report(
        createEntry(command.path).makeDirectory(command.parents, mode),
        'Directory not created',
        { path: command.path, parents: command.parents, mode: formatPermissions(mode) },
      );
    }

    case CLI_COMMAND.MOVE:
      return report(createEntry(command.source).move(command.destination, command.force), 'Move failed', {
        source: command.source,
        destination: command.destination,
        force: command.force,
      });

    case CLI_COMMAND.RENAME:
      return report(createEntry(command.path).rename(command.newName, command.force), 'Rename failed', {
        path: command.path,
        name: command.newName,
        force: command.force,
      });

    case CLI_COMMAND.REMOVE_FILE:
      return report(createEntry(command.path).removeFile(), 'File not removed', { path: command.path });

    case CLI_COMMAND.REMOVE_DIRECTORY:
      return report(
        createEntry(command.path).removeDirectory(command.recursive),
        'Directory not removed',
        { path: command.path, recursive: command.recursive },
      );

    case CLI_COMMAND.READ:
      return withContent(command.path, (entry) => write(entry.read()));

    case CLI_COMMAND.APPEND:
      return withContent(command.path, (entry) => entry.append(command.content));

    case CLI_COMMAND.WRITE:
      return withContent(command.path, (entry) => entry.write(command.content));
  }
};
