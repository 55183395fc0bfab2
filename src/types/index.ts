/**
 * Core types for the company info bot
 */

/** Slack conversation id (channel or direct message) that receives broadcasts. */
export type ChatId = string;

export interface CompanyInfo {
  name?: string;
  industry?: string;
}

export interface TeamMember {
  name: string;
  role: string;
}

export interface Contacts {
  ivanovs_phone?: string;
  oleg_email?: string;
  oleg_phone?: string;
}

/** A weekly event; `day` is a weekday label and `time` a local "HH:MM" clock time. */
export interface CompanyEvent {
  day: string;
  time: string;
  title: string;
  description: string;
}

/** Digest text keyed by weekday label. */
export type DigestTable = Record<string, string>;

export interface CompanyDocument {
  subscribers: ChatId[];
  company: CompanyInfo;
  team: TeamMember[];
  contacts: Contacts;
  events: CompanyEvent[];
  digests: DigestTable;
  [key: string]: unknown;
}

export interface Employee {
  name: string;
  department: string;
  position: string;
  email: string;
  phone: string;
  hire_date: string;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

export interface DeliveryReport {
  delivered: ChatId[];
  failed: ChatId[];
}

export interface Messenger {
  sendMessage(chatId: ChatId, text: string): Promise<void>;
}
