import { CompanyEvent, CompanyInfo, Contacts, Employee, TeamMember } from '../types';

/** Fixed reply texts. */
export const REPLIES = {
  noTeam: 'Нет данных о команде.',
  noEvents: 'Ближайших событий нет.',
  noDigest: 'На сегодня нет дайджеста.',
  noRoster: 'Файл сотрудников не найден или пуст.',
  noDepartments: 'Отделы не найдены.',
  noStaff: 'Сотрудники не найдены по заданному фильтру.',
  nothingFound: 'Ничего не найдено.',
  findUsage: 'Использование: /find <строка поиска>',
  unexpectedError: 'Произошла ошибка. Попробуйте ещё раз позже.',
} as const;

export const HELP_TEXT = [
  'Доступные команды:',
  '/start — приветствие и подписка на дайджесты',
  '/help — список команд',
  '/company — информация о компании',
  '/team — состав команды',
  '/contacts — контакты сотрудников',
  '/events — предстоящие события',
  '/digest — сегодняшний дайджест',
  '/departments — отделы из файла сотрудников',
  '/staff — список сотрудников (опц. отдел)',
  '/find — поиск сотрудников по имени/должности/отделу',
].join('\n');

const MISSING = '—';

export const bold = (text: string) => `*${text}*`;

export const code = (text: string) => `\`${text}\``;

export function formatGreeting(userName: string, companyName: string): string {
  return [
    `Привет, ${userName}! Я бот компании ${bold(companyName)}`,
    'Помогу с информацией о компании, контактах, событиях и пришлю дайджест.',
    `Посмотри ${code('/help')} для списка команд.`,
  ].join('\n');
}

export function formatCompany(company: CompanyInfo): string {
  return `${bold(company.name || 'Компания')}\nСфера: ${company.industry || 'Сфера деятельности'}`;
}

export function formatTeam(team: TeamMember[]): string {
  if (team.length === 0) return REPLIES.noTeam;
  return ['Состав команды:', ...team.map((member) => `- ${member.name} — ${member.role}`)].join('\n');
}

export function formatContacts(contacts: Contacts): string {
  return [
    `Ивановы (общий): ${code(contacts.ivanovs_phone || MISSING)}`,
    `Олег Арсипов: ${code(contacts.oleg_email || MISSING)}, ${code(contacts.oleg_phone || MISSING)}`,
  ].join('\n');
}

export function formatEvents(events: CompanyEvent[]): string {
  if (events.length === 0) return REPLIES.noEvents;
  return [
    'Предстоящие события (еженедельно):',
    ...events.map((ev) => `- ${ev.day} ${ev.time}: ${ev.title} — ${ev.description}`),
  ].join('\n');
}

export function formatEmployee(employee: Employee): string {
  return (
    `- ${employee.name} — ${employee.position} (${employee.department})\n` +
    `  email: ${employee.email}, phone: ${employee.phone}`
  );
}

export function formatEmployeeList(title: string, employees: Employee[]): string {
  return [title, ...employees.map(formatEmployee)].join('\n');
}

export function formatDepartments(departments: string[]): string {
  if (departments.length === 0) return REPLIES.noDepartments;
  return ['Отделы:', ...departments.map((d) => `- ${d}`)].join('\n');
}

export function formatReminder(event: Pick<CompanyEvent, 'title' | 'time' | 'description'>): string {
  return `Напоминание: ${event.title} в ${event.time}. ${event.description}`;
}
