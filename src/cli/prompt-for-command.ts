import { confirm, input, select } from '@inquirer/prompts';

import { formatPermissions } from '../utils/parse-permissions';
import { permissionsSchema } from '../utils/get-config';
import { CLI_COMMAND, LIST_FILTER, resolveHome } from './parse-args';
import type { CliCommand, CliCommandName, ListFilter } from './parse-args';

const COMMAND_CHOICES: Array<{ name: string; value: CliCommandName }> = [
  { name: 'Info - Show details about a path', value: CLI_COMMAND.INFO },
  { name: 'List - List directory entries', value: CLI_COMMAND.LIST },
  { name: 'Read - Print file content', value: CLI_COMMAND.READ },
  { name: 'Write - Replace file content', value: CLI_COMMAND.WRITE },
  { name: 'Append - Append to a file', value: CLI_COMMAND.APPEND },
  { name: 'Create file', value: CLI_COMMAND.TOUCH },
  { name: 'Create directory', value: CLI_COMMAND.MKDIR },
  { name: 'Move', value: CLI_COMMAND.MOVE },
  { name: 'Rename', value: CLI_COMMAND.RENAME },
  { name: 'Remove file', value: CLI_COMMAND.REMOVE_FILE },
  { name: 'Remove directory', value: CLI_COMMAND.REMOVE_DIRECTORY },
  { name: 'Help - Show usage information', value: CLI_COMMAND.HELP },
];

const required = (value: string) => (value.trim().length > 0 ? true : 'A value is required');

const askPath = async (message = 'Path') => resolveHome(await input({ message, validate: required }));

/**
 * Ask for a command and its arguments.
 * @returns null when the user declines a confirmation
 */
export const promptForCommand = async (defaultDirectoryMode: number): Promise<CliCommand | null> => {
  const name = await select({
    message: 'What would you like to do?',
    choices: COMMAND_CHOICES,
    pageSize: 12,
  });

  switch (name) {
    case CLI_COMMAND.HELP:
      return { name };
    case CLI_COMMAND.INFO:
    case CLI_COMMAND.READ:
      return { name, path: await askPath() };
    case CLI_COMMAND.LIST: {
      const targetPath = await askPath('Directory');
      const filter = await select<ListFilter>({
        message: 'Show',
        choices: [
          { name: 'Everything', value: LIST_FILTER.ALL },
          { name: 'Directories', value: LIST_FILTER.DIRECTORIES },
          { name: 'Files', value: LIST_FILTER.FILES },
        ],
      });
      const recursive = await confirm({ message: 'Include subdirectories?', default: false });
      const showHidden = await confirm({ message: 'Include hidden entries?', default: false });
      return { name, path: targetPath, recursive, showHidden, filter };
    }
    case CLI_COMMAND.TOUCH: {
      const targetPath = await askPath();
      const force = await confirm({ message: 'Truncate the file if it exists?', default: false });
      return { name, path: targetPath, force };
    }
    case CLI_COMMAND.MKDIR: {
      const targetPath = await askPath('Directory');
      const parents = await confirm({ message: 'Create missing parents?', default: true });
      const modeAnswer = await input({
        message: 'Permissions',
        default: formatPermissions(defaultDirectoryMode),
        validate: (value) => permissionsSchema.safeParse(value).success || 'Expected octal permissions like 755',
      });
      const mode = permissionsSchema.parse(modeAnswer);
      return { name, path: targetPath, parents, mode };
    }
    case CLI_COMMAND.MOVE: {
      const source = await askPath('Source');
      const destination = await askPath('Destination');
      const force = await confirm({ message: 'Replace the destination if it exists?', default: false });
      return { name, source, destination, force };
    }
    case CLI_COMMAND.RENAME: {
      const targetPath = await askPath();
      const newName = await input({ message: 'New name', validate: required });
      const force = await confirm({ message: 'Replace an existing entry with that name?', default: false });
      return { name, path: targetPath, newName, force };
    }
    case CLI_COMMAND.REMOVE_FILE: {
      const targetPath = await askPath();
      const proceed = await confirm({ message: `Remove ${targetPath}?`, default: false });
      return proceed ? { name, path: targetPath } : null;
    }
    case CLI_COMMAND.REMOVE_DIRECTORY: {
      const targetPath = await askPath('Directory');
      const recursive = await confirm({ message: 'Remove everything inside it too?', default: false });
      const proceed = await confirm({
        message: recursive ? `Remove ${targetPath} and all its contents?` : `Remove ${targetPath}?`,
        default: false,
      });
      return proceed ? { name, path: targetPath, recursive } : null;
    }
    case CLI_COMMAND.APPEND: {
      const targetPath = await askPath();
      const content = await input({ message: 'Content' });
      return { name, path: targetPath, content };
    }
    case CLI_COMMAND.WRITE: {
      const targetPath = await askPath();
      const content = await input({ message: 'Content' });
      const proceed = await confirm({ message: `Replace the content of ${targetPath}?`, default: false });
      return proceed ? { name, path: targetPath, content } : null;
    }
  }
};
