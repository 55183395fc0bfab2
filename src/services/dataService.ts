import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { StorageError, isNotFoundError } from '../errors';
import type { Logger } from '../logger';
import { ChatId, CompanyDocument, CompanyEvent } from '../types';

const text = z.string().catch('');

const emptyEvent: CompanyEvent = { day: '', time: '', title: '', description: '' };

// Each field falls back on its own so one bad entry never empties the document.
const documentSchema = z
  .object({
    subscribers: z
      .array(z.unknown())
      .catch([])
      .transform((ids) =>
        ids.flatMap((id): ChatId[] => {
          if (typeof id === 'string' && id.trim()) return [id];
          if (typeof id === 'number' && Number.isInteger(id)) return [String(id)];
          return [];
        })
      ),
    company: z.object({ name: z.string().optional(), industry: z.string().optional() }).catch({}),
    team: z.array(z.object({ name: text, role: text }).catch({ name: '', role: '' })).catch([]),
    contacts: z
      .object({
        ivanovs_phone: z.string().optional(),
        oleg_email: z.string().optional(),
        oleg_phone: z.string().optional(),
      })
      .catch({}),
    events: z
      .array(z.object({ day: text, time: text, title: text, description: text }).catch({ ...emptyEvent }))
      .catch([]),
    digests: z
      .record(z.unknown())
      .catch({})
      .transform((table) => {
        const digests: Record<string, string> = {};
        for (const [day, body] of Object.entries(table)) {
          if (typeof body === 'string') digests[day] = body;
        }
        return digests;
      }),
  })
  .passthrough();

export const emptyDocument = (): CompanyDocument => ({
  subscribers: [],
  company: {},
  team: [],
  contacts: {},
  events: [],
  digests: {},
});

/**
 * File-backed store for the company document. Every load returns a fresh
 * snapshot; every save replaces the file atomically.
 */
export class DataService {
  private dataFilePath: string;
  private logger: Logger;

  constructor(dataFilePath: string, logger: Logger) {
    this.dataFilePath = dataFilePath;
    this.logger = logger;
  }

  /**
   * Load the document. A missing or unreadable file yields an empty document.
   */
  async load(): Promise<CompanyDocument> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.dataFilePath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.error(`Data file not found at ${this.dataFilePath}`);
      } else {
        this.logger.error(`Failed to read ${this.dataFilePath}:`, error);
      }
      return emptyDocument();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.error(`Failed to parse ${this.dataFilePath}:`, error);
      return emptyDocument();
    }

    const result = documentSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.error(`Data file ${this.dataFilePath} does not hold a JSON object`);
      return emptyDocument();
    }
    return result.data;
  }

  /**
   * Write to a temporary file beside the target, then rename it into place so
   * readers see either the old or the new document.
   */
  async save(document: CompanyDocument): Promise<void> {
    const dir = path.dirname(this.dataFilePath);
    const tmpPath = path.join(dir, `${path.basename(this.dataFilePath)}.${crypto.randomUUID()}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.promises.rename(tmpPath, this.dataFilePath);
    } catch (error) {
      this.logger.error('Error saving data:', error);
      await fs.promises.rm(tmpPath, { force: true });
      throw new StorageError();
    }
  }

  /**
   * Add a chat to the subscriber list. Returns false when it was already there.
   *
   * Read-modify-write without locking: two simultaneous subscribes may lose one.
   */
  async addSubscriber(chatId: ChatId): Promise<boolean> {
    const document = await this.load();
    if (document.subscribers.includes(chatId)) {
      return false;
    }
    await this.save({ ...document, subscribers: [...document.subscribers, chatId] });
    return true;
  }
}

export const createDataService = (dataFilePath: string, logger: Logger): DataService => {
  return new DataService(dataFilePath, logger);
};
