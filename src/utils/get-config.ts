import { z } from 'zod';

import { parsePermissions } from './parse-permissions';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const permissionsSchema = z.string().transform((value, context) => {
  const mode = parsePermissions(value);
  if (mode === undefined) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected octal permissions like 755, got "${value}"`,
    });
    return z.NEVER;
  }
  return mode;
});

const configSchema = z
  .object({
    NODE_ENV: z.string().min(1).default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    FS_ENTRY_DIR_MODE: permissionsSchema.default('775'),
  })
  .transform((env) => ({
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    directoryMode: env.FS_ENTRY_DIR_MODE,
  }));

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  public constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export const getConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
};
