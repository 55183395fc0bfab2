import path from 'path';
import { z } from 'zod';

import { ConfigurationError } from './errors';
import { LogLevel } from './logger';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const configSchema = z
  .object({
    slackBotToken: z.preprocess(
      blankToUndefined,
      z.string({ required_error: 'SLACK_BOT_TOKEN is not set. Provide it via .env' }).trim()
    ),
    slackAppToken: optionalString,
    slackSigningSecret: optionalString,

    // Transport
    transportMode: z.preprocess(blankToUndefined, z.enum(['socket', 'http']).default('socket')),
    host: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
    port: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3000)),
    endpointPath: z.preprocess(
      blankToUndefined,
      z
        .string()
        .default('/slack/events')
        .transform((p) => (p.startsWith('/') ? p : `/${p}`))
    ),
    publicUrl: z.preprocess(blankToUndefined, z.string().url().optional()),

    // Scheduling; an unknown zone is handled later with a fallback
    timeZone: optionalString,

    // Files
    dataFilePath: z.string(),
    employeesFilePath: z.string(),
    employeesWorkbookPath: z.string(),

    logLevel: z.preprocess(blankToUndefined, z.nativeEnum(LogLevel).default(LogLevel.INFO)),
  })
  .superRefine((config, ctx) => {
    if (config.transportMode === 'socket' && !config.slackAppToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slackAppToken'],
        message: 'SLACK_APP_TOKEN is required when TRANSPORT_MODE=socket',
      });
    }
    if (config.transportMode === 'http' && !config.slackSigningSecret) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slackSigningSecret'],
        message: 'SLACK_SIGNING_SECRET is required when TRANSPORT_MODE=http',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

/**
 * Reads the bot configuration from the environment. Relative file paths are
 * resolved against `baseDir`. Throws a fatal ConfigurationError listing every
 * problem when the environment is unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, baseDir: string = process.cwd()): Config {
  const result = configSchema.safeParse({
    slackBotToken: env.SLACK_BOT_TOKEN,
    slackAppToken: env.SLACK_APP_TOKEN,
    slackSigningSecret: env.SLACK_SIGNING_SECRET,
    transportMode: env.TRANSPORT_MODE,
    host: env.HOST,
    port: env.PORT,
    endpointPath: env.ENDPOINT_PATH,
    publicUrl: env.PUBLIC_URL,
    timeZone: env.TIMEZONE,
    dataFilePath: path.resolve(baseDir, env.DATA_FILE_PATH || 'data/company.json'),
    employeesFilePath: path.resolve(baseDir, env.EMPLOYEES_FILE_PATH || 'data/employees.csv'),
    employeesWorkbookPath: path.resolve(baseDir, env.EMPLOYEES_XLSX_PATH || 'data/employees.xlsx'),
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${problems.join('\n')}`, { fatal: true });
  }

  return result.data;
}

/** The URL Slack must be configured to call in HTTP mode, when a public base URL is known. */
export function requestUrl(config: Config): string | undefined {
  if (!config.publicUrl) return undefined;
  return config.publicUrl.replace(/\/+$/, '') + config.endpointPath;
}
