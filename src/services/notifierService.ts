import type { Logger } from '../logger';
import { weekdayAt } from '../time/weekday';
import { ChatId, CompanyEvent, DeliveryReport, Messenger } from '../types';
import { formatReminder } from '../views/replies';
import { DataService } from './dataService';

/**
 * Broadcasts scheduled messages to every subscriber. Each fire re-reads the
 * store, so subscribers and digest texts are as current as the file.
 */
export class NotifierService {
  private dataService: DataService;
  private messenger: Messenger;
  private timeZone: string;
  private logger: Logger;
  private now: () => Date;

  constructor(
    dataService: DataService,
    messenger: Messenger,
    timeZone: string,
    logger: Logger,
    now: () => Date = () => new Date()
  ) {
    this.dataService = dataService;
    this.messenger = messenger;
    this.timeZone = timeZone;
    this.logger = logger;
    this.now = now;
  }

  /**
   * Send today's digest. No digest for today means no messages.
   */
  async sendDailyDigest(): Promise<DeliveryReport> {
    const today = weekdayAt(this.now(), this.timeZone);
    const document = await this.dataService.load();
    const message = document.digests[today];

    if (!message) {
      this.logger.debug(`No digest for ${today}`);
      return { delivered: [], failed: [] };
    }

    return this.broadcast(document.subscribers, message, 'digest');
  }

  async sendEventReminder(event: CompanyEvent): Promise<DeliveryReport> {
    const document = await this.dataService.load();
    return this.broadcast(document.subscribers, formatReminder(event), 'event reminder');
  }

  private async broadcast(subscribers: ChatId[], text: string, kind: string): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: [], failed: [] };

    for (const chatId of subscribers) {
      try {
        await this.messenger.sendMessage(chatId, text);
        report.delivered.push(chatId);
      } catch (error) {
        this.logger.warn(`Failed to send ${kind} to ${chatId}:`, error);
        report.failed.push(chatId);
      }
    }

    this.logger.info(`Sent ${kind} to ${report.delivered.length} of ${subscribers.length} subscribers`);
    return report;
  }
}

export const createNotifierService = (
  dataService: DataService,
  messenger: Messenger,
  timeZone: string,
  logger: Logger
): NotifierService => {
  return new NotifierService(dataService, messenger, timeZone, logger);
};
