import pino from 'pino';
import pretty from 'pino-pretty';

import { ConfigError, getConfig } from './get-config';
import type { Config } from './get-config';

let logger: pino.Logger | undefined;

type LoggerSettings = Pick<Config, 'environment' | 'logLevel'> & { issues: string[] };

// Logging must not turn a failed filesystem call into a configuration error
const readSettings = (): LoggerSettings => {
  try {
    const { environment, logLevel } = getConfig();
    return { environment, logLevel, issues: [] };
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    return {
      environment: process.env.NODE_ENV || 'development',
      logLevel: 'info',
      issues: error.issues,
    };
  }
};

export const getLogger = (): pino.Logger => {
  if (logger) {
    return logger;
  }

  const { environment, logLevel, issues } = readSettings();
  const isProduction = environment === 'production';

  const loggerConfig: pino.LoggerOptions = {
    level: logLevel,
    base: {
      service: 'fs-entry',
      environment,
    },
  };

  if (!isProduction) {
    // Pretty output goes to stderr so stdout carries only command output
    const prettyStream = pretty({
      colorize: true,
      singleLine: true,
      translateTime: 'yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
      destination: process.stderr,
    });

    logger = pino(loggerConfig, prettyStream);
  } else {
    logger = pino(loggerConfig);
  }

  if (issues.length > 0) {
    logger.warn({ issues }, 'Invalid logging configuration, using defaults');
  }
  return logger;
};
