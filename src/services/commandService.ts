import type { Logger } from '../logger';
import { weekdayAt } from '../time/weekday';
import { ChatId, CommandResult } from '../types';
import {
  HELP_TEXT,
  REPLIES,
  formatCompany,
  formatContacts,
  formatDepartments,
  formatEmployeeList,
  formatEvents,
  formatGreeting,
  formatTeam,
} from '../views/replies';
import { DataService } from './dataService';
import { DirectoryService } from './directoryService';

export class CommandService {
  private dataService: DataService;
  private directoryService: DirectoryService;
  private timeZone: string;
  private now: () => Date;

  constructor(
    dataService: DataService,
    directoryService: DirectoryService,
    timeZone: string,
    now: () => Date = () => new Date()
  ) {
    this.dataService = dataService;
    this.directoryService = directoryService;
    this.timeZone = timeZone;
    this.now = now;
  }

  /**
   * Subscribe the conversation to broadcasts and greet the user.
   */
  async start(chatId: ChatId | undefined, userName: string): Promise<CommandResult> {
    if (chatId) {
      await this.dataService.addSubscriber(chatId);
    }
    const document = await this.dataService.load();
    return { success: true, message: formatGreeting(userName, document.company.name || 'Компания') };
  }

  help(): CommandResult {
    return { success: true, message: HELP_TEXT };
  }

  async company(): Promise<CommandResult> {
    const document = await this.dataService.load();
    return { success: true, message: formatCompany(document.company) };
  }

  async team(): Promise<CommandResult> {
    const { team } = await this.dataService.load();
    return { success: team.length > 0, message: formatTeam(team) };
  }

  async contacts(): Promise<CommandResult> {
    const document = await this.dataService.load();
    return { success: true, message: formatContacts(document.contacts) };
  }

  async events(): Promise<CommandResult> {
    const { events } = await this.dataService.load();
    return { success: events.length > 0, message: formatEvents(events) };
  }

  async digest(): Promise<CommandResult> {
    const today = weekdayAt(this.now(), this.timeZone);
    const { digests } = await this.dataService.load();
    const message = digests[today];

    if (!message) {
      return { success: false, message: REPLIES.noDigest };
    }
    return { success: true, message };
  }

  async departments(): Promise<CommandResult> {
    const result = await this.directoryService.departments();
    if (result.status === 'unavailable') {
      return { success: false, message: REPLIES.noRoster };
    }
    return { success: result.departments.length > 0, message: formatDepartments(result.departments) };
  }

  /**
   * List staff, optionally filtered by a department substring. Usage: /staff [отдел]
   */
  async staff(args: string): Promise<CommandResult> {
    const result = await this.directoryService.staff(args);
    if (result.status === 'unavailable') {
      return { success: false, message: REPLIES.noRoster };
    }
    if (result.employees.length === 0) {
      return { success: false, message: REPLIES.noStaff };
    }
    return { success: true, message: formatEmployeeList('Сотрудники:', result.employees) };
  }

  /**
   * Search by name, position or department. Usage: /find маркет
   */
  async find(args: string): Promise<CommandResult> {
    const result = await this.directoryService.find(args);
    if (result.status === 'unavailable') {
      return { success: false, message: REPLIES.noRoster };
    }
    if (!args.trim()) {
      return { success: false, message: REPLIES.findUsage };
    }
    if (result.employees.length === 0) {
      return { success: false, message: REPLIES.nothingFound };
    }
    return { success: true, message: formatEmployeeList('Найдено:', result.employees) };
  }
}

/**
 * Runs a command, turning any unexpected failure into the generic apology so
 * the user always gets an answer.
 */
export async function runCommand(
  name: string,
  action: () => CommandResult | Promise<CommandResult>,
  logger: Logger
): Promise<CommandResult> {
  try {
    return await action();
  } catch (error) {
    logger.error(`Exception while handling /${name}:`, error);
    return { success: false, message: REPLIES.unexpectedError };
  }
}

export const createCommandService = (
  dataService: DataService,
  directoryService: DirectoryService,
  timeZone: string
): CommandService => {
  return new CommandService(dataService, directoryService, timeZone);
};
