#!/usr/bin/env node
import { PathEntry } from './application/services/path-entry';
import { formatHelp } from './cli/help';
import { CliUsageError, parseArgs } from './cli/parse-args';
import { promptForCommand } from './cli/prompt-for-command';
import { EXIT_CODE, runCommand } from './cli/run-command';
import type { ExitCode } from './cli/run-command';
import { ConfigError, getConfig } from './utils/get-config';
import { getLogger } from './utils/get-logger';

const main = async (): Promise<ExitCode> => {
  const config = getConfig();
  const logger = getLogger();

  let command = parseArgs(process.argv.slice(2));

  if (!command) {
    if (!process.stdin.isTTY) {
      process.stdout.write(formatHelp());
      return EXIT_CODE.SUCCESS;
    }

    command = await promptForCommand(config.directoryMode);
    if (!command) {
      logger.info('Cancelled');
      return EXIT_CODE.SUCCESS;
    }
  }

  return runCommand(command, {
    createEntry: (targetPath) => new PathEntry(targetPath),
    write: (text) => process.stdout.write(text),
    logger,
    defaultDirectoryMode: config.directoryMode,
  });
};

const run = async () => {
  try {
    process.exitCode = await main();
  } catch (error) {
    // Without a valid configuration there is no logger to report through
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      process.exitCode = EXIT_CODE.USAGE;
      return;
    }

    const logger = getLogger();
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      process.stdout.write(formatHelp());
      process.exitCode = EXIT_CODE.USAGE;
      return;
    }

    logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    process.exitCode = EXIT_CODE.FAILURE;
  }
};

void run();
