/**
 * State Store
 *
 * Durable {cash, shares, stock_price} record in a single JSON file.
 *
 * - load(): read once at startup; a missing or unreadable file means first
 *   run and yields the defaults
 * - save(): write to a temp file and rename it over the record, so readers
 *   only ever see a complete file
 *
 * Persistence is best effort. A failed save is logged and reported in the
 * return value; it never throws.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_PORTFOLIO_RECORD,
  PortfolioRecordSchema,
  createSilentLogger,
  type Logger,
  type PortfolioRecord,
} from '@stocksim/shared';

export const DEFAULT_STATE_FILE = 'portfolio.json';

export interface StateStoreOptions {
  /** Path of the JSON record */
  filePath?: string;
  logger?: Logger;
}

export type SaveResult = { ok: true } | { ok: false; error: Error };

export class StateStore {
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(options: StateStoreOptions = {}) {
    this.filePath = path.resolve(options.filePath ?? DEFAULT_STATE_FILE);
    this.logger = options.logger ?? createSilentLogger('state-store');
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Read the record, falling back to defaults
   */
  load(): PortfolioRecord {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.info('No saved portfolio, starting fresh', { file: this.filePath });
      } else {
        this.logger.warn('Could not read saved portfolio, using defaults', {
          file: this.filePath,
          error: toError(error).message,
        });
      }
      return { ...DEFAULT_PORTFOLIO_RECORD };
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Saved portfolio is not valid JSON, using defaults', {
        file: this.filePath,
        error: toError(error).message,
      });
      return { ...DEFAULT_PORTFOLIO_RECORD };
    }

    const parsed = PortfolioRecordSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn('Saved portfolio has invalid fields, using defaults', {
        file: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return { ...DEFAULT_PORTFOLIO_RECORD };
    }

    this.logger.debug('Loaded portfolio', { file: this.filePath, ...parsed.data });
    return parsed.data;
  }

  /**
   * Overwrite the record
   */
  save(record: PortfolioRecord): SaveResult {
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(record), 'utf-8');
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      const err = toError(error);
      this.logger.error('Failed to save portfolio', { file: this.filePath, error: err.message });
      return { ok: false, error: err };
    }

    this.logger.debug('Saved portfolio', { file: this.filePath, ...record });
    return { ok: true };
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
