import { App, SlashCommand } from '@slack/bolt';
import dotenv from 'dotenv';

import { Config, loadConfig, requestUrl } from './config';
import { isFatalConfigurationError } from './errors';
import { LogLevel, LoggerFactory, createLoggerFactory } from './logger';
import { createCronJobRunner } from './schedule/jobRunner';
import { CommandService, createCommandService, runCommand } from './services/commandService';
import { createDataService } from './services/dataService';
import { createDirectoryService } from './services/directoryService';
import { createNotifierService } from './services/notifierService';
import { createSchedulerService } from './services/schedulerService';
import { createSlackMessenger } from './services/slackMessenger';
import { resolveTimeZone } from './time/zoned';
import { CommandResult } from './types';

dotenv.config();

type CommandHandler = (command: SlashCommand) => CommandResult | Promise<CommandResult>;

const commandHandlers = (commands: CommandService): Record<string, CommandHandler> => ({
  start: (command) => commands.start(command.channel_id, command.user_name),
  help: () => commands.help(),
  company: () => commands.company(),
  team: () => commands.team(),
  contacts: () => commands.contacts(),
  events: () => commands.events(),
  digest: () => commands.digest(),
  departments: () => commands.departments(),
  staff: (command) => commands.staff(command.text),
  find: (command) => commands.find(command.text),
});

function createApp(config: Config, createLogger: LoggerFactory): App {
  const logger = createLogger('slack');

  if (config.transportMode === 'socket') {
    return new App({
      token: config.slackBotToken,
      appToken: config.slackAppToken,
      socketMode: true,
      logger,
    });
  }

  return new App({
    token: config.slackBotToken,
    signingSecret: config.slackSigningSecret,
    endpoints: config.endpointPath,
    logger,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const createLogger = createLoggerFactory(config.logLevel);
  const logger = createLogger('company-bot');

  const timeZone = resolveTimeZone(config.timeZone, logger);
  const dataService = createDataService(config.dataFilePath, createLogger('store'));
  const directoryService = createDirectoryService(
    config.employeesFilePath,
    createLogger('directory'),
    config.employeesWorkbookPath
  );
  const commandService = createCommandService(dataService, directoryService, timeZone);

  const app = createApp(config, createLogger);

  for (const [name, handler] of Object.entries(commandHandlers(commandService))) {
    app.command(`/${name}`, async ({ command, ack, respond }) => {
      await ack();
      const result = await runCommand(name, () => handler(command), logger);
      await respond({ text: result.message, response_type: 'ephemeral' });
    });
  }

  app.error(async (error) => {
    logger.error('Exception while handling an update:', error);
  });

  const notifier = createNotifierService(dataService, createSlackMessenger(app.client), timeZone, createLogger('notifier'));
  const scheduler = createSchedulerService(
    dataService,
    notifier,
    createCronJobRunner(createLogger('jobs')),
    timeZone,
    createLogger('scheduler')
  );
  await scheduler.start();

  if (config.transportMode === 'socket') {
    await app.start();
    logger.info('Slack app is running in socket mode');
  } else {
    await app.start({ port: config.port, host: config.host });
    logger.info(`Slack app is listening on ${config.host}:${config.port}${config.endpointPath}`);
    const url = requestUrl(config);
    if (url) {
      logger.info(`Request URL for the Slack app configuration: ${url}`);
    } else {
      logger.warn('PUBLIC_URL is not set; configure the Slack request URL by hand');
    }
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, stopping`);
    try {
      scheduler.stop();
      await app.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  const logger = createLoggerFactory(LogLevel.INFO)('company-bot');
  if (isFatalConfigurationError(error)) {
    logger.error(error.message);
  } else {
    logger.error('Failed to start:', error);
  }
  process.exit(1);
});
