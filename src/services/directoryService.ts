import fs from 'fs';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { z } from 'zod';

import { isNotFoundError } from '../errors';
import type { Logger } from '../logger';
import { Employee } from '../types';

export const REQUIRED_COLUMNS = ['name', 'department', 'position', 'email', 'phone', 'hire_date'] as const;

/** Replies stay short: at most this many records per lookup. */
export const RESULT_LIMIT = 20;

const rowsSchema = z.array(z.record(z.string()));

export type Unavailable = { status: 'unavailable'; reason: string };

export type RosterResult = Unavailable | { status: 'ready'; employees: Employee[] };

export type DirectoryLookup<T> = Unavailable | ({ status: 'ok' } & T);

const unavailable = (reason: string): Unavailable => ({ status: 'unavailable', reason });

const normalizeColumn = (column: unknown) => String(column).trim().toLowerCase();

const contains = (field: string, needle: string) => field.toLowerCase().includes(needle);

/**
 * Employee roster read from a CSV file, or from the first sheet of a workbook
 * when the CSV is absent. A missing, empty or malformed file is reported as an
 * `unavailable` result, never thrown.
 */
export class DirectoryService {
  private filePath: string;
  private logger: Logger;
  private spreadsheetPath?: string;

  constructor(filePath: string, logger: Logger, spreadsheetPath?: string) {
    this.filePath = filePath;
    this.logger = logger;
    this.spreadsheetPath = spreadsheetPath;
  }

  /** Roster as CSV text, converting the workbook's first sheet when only that exists. */
  private async readTable(): Promise<string | Unavailable> {
    try {
      return await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        this.logger.error('Failed to read employees file:', error);
        return unavailable('unreadable');
      }
    }

    if (!this.spreadsheetPath) {
      this.logger.info(`No employees file found at ${this.filePath}`);
      return unavailable('not found');
    }

    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(this.spreadsheetPath);
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info(`No employees file found at ${this.filePath} or ${this.spreadsheetPath}`);
        return unavailable('not found');
      }
      this.logger.error('Failed to read employees workbook:', error);
      return unavailable('unreadable');
    }

    try {
      const workbook = XLSX.read(buffer, { type: 'buffer' });
      const [firstSheet] = workbook.SheetNames;
      const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
      return sheet ? XLSX.utils.sheet_to_csv(sheet, { blankrows: false }) : '';
    } catch (error) {
      this.logger.error('Failed to load employees workbook:', error);
      return unavailable('malformed');
    }
  }

  async load(): Promise<RosterResult> {
    const content = await this.readTable();
    if (typeof content !== 'string') return content;
    if (content.trim() === '') return unavailable('empty');

    let header: string[] = [];
    let records: unknown;
    try {
      // Short rows leave their trailing cells empty, long rows drop the extras.
      records = parse(content, {
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
        columns: (columns: unknown[]) => {
          header = columns.map(normalizeColumn);
          return header;
        },
      });
    } catch (error) {
      this.logger.error('Failed to load employees file:', error);
      return unavailable('malformed');
    }

    const missing = REQUIRED_COLUMNS.find((column) => !header.includes(column));
    if (missing) {
      this.logger.error(`Employees file missing column '${missing}'`);
      return unavailable(`missing column ${missing}`);
    }

    const rows = rowsSchema.safeParse(records);
    if (!rows.success) {
      this.logger.error('Employees file has unexpected rows:', rows.error.message);
      return unavailable('malformed');
    }
    if (rows.data.length === 0) {
      return unavailable('empty');
    }

    return {
      status: 'ready',
      employees: rows.data.map((row) => ({
        name: row.name ?? '',
        department: row.department ?? '',
        position: row.position ?? '',
        email: row.email ?? '',
        phone: row.phone ?? '',
        hire_date: row.hire_date ?? '',
      })),
    };
  }

  /**
   * Distinct non-empty department names, sorted.
   */
  async departments(): Promise<DirectoryLookup<{ departments: string[] }>> {
    const roster = await this.load();
    if (roster.status === 'unavailable') return roster;

    const departments = [...new Set(roster.employees.map((e) => e.department).filter((d) => d !== ''))].sort();
    return { status: 'ok', departments };
  }

  /**
   * Employees whose department contains `department`; everyone when it is blank.
   */
  async staff(department?: string): Promise<DirectoryLookup<{ employees: Employee[] }>> {
    const roster = await this.load();
    if (roster.status === 'unavailable') return roster;

    const needle = department?.trim().toLowerCase() ?? '';
    const employees = needle
      ? roster.employees.filter((e) => contains(e.department, needle))
      : roster.employees;
    return { status: 'ok', employees: employees.slice(0, RESULT_LIMIT) };
  }

  /**
   * Case-insensitive substring search over name, department and position.
   */
  async find(query: string): Promise<DirectoryLookup<{ employees: Employee[] }>> {
    const roster = await this.load();
    if (roster.status === 'unavailable') return roster;

    const needle = query.trim().toLowerCase();
    const employees = roster.employees.filter(
      (e) => contains(e.name, needle) || contains(e.department, needle) || contains(e.position, needle)
    );
    return { status: 'ok', employees: employees.slice(0, RESULT_LIMIT) };
  }
}

export const createDirectoryService = (
  filePath: string,
  logger: Logger,
  spreadsheetPath?: string
): DirectoryService => {
  return new DirectoryService(filePath, logger, spreadsheetPath);
};
