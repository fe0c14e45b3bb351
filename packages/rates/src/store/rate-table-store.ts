import { constants } from 'node:fs';
import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { hasErrorCode, wrapError } from '@posledger/core';
import { getLogger, type Logger } from '@posledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { parseRateDocument, serializeRateTable } from '../document/rate-document-codec.js';
import { RateTable } from '../table/rate-table.js';

export const RATES_FILENAME = 'commission_rates.yaml';

/**
 * Persistence for the current rate table plus its backups.
 */
export interface RateTableStore {
  /** The persisted table; an empty table when nothing has been saved yet */
  load(): Promise<Result<RateTable, Error>>;
  save(table: RateTable): Promise<Result<void, Error>>;
  /** Copy of the persisted state; the backup's name, or undefined when there was nothing to copy */
  backup(): Promise<Result<string | undefined, Error>>;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

// 20240301_101500_123
export function backupTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

/**
 * YAML table file. Backups sit next to it as
 * `commission_rates.backup.<timestamp>[_<n>].yaml`; saves replace the file through
 * a rename so a crash never leaves half a table behind.
 */
export class FileRateTableStore implements RateTableStore {
  private readonly logger: Logger;

  constructor(
    private readonly filePath: string,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.logger = getLogger('RateTableStore');
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<Result<RateTable, Error>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.warn({ filePath: this.filePath }, 'Rate table file does not exist, starting empty');
        return ok(RateTable.empty());
      }
      return wrapError(error, `Failed to read ${this.filePath}`);
    }

    const table = parseRateDocument(content, 'yaml');
    if (table.isErr()) {
      return err(table.error);
    }
    this.logger.debug({ banks: table.value.bankIds.length, version: table.value.version }, 'Loaded rate table');
    return ok(table.value);
  }

  async save(table: RateTable): Promise<Result<void, Error>> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, serializeRateTable(table, 'yaml'), 'utf-8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      return wrapError(error, `Failed to save ${this.filePath}`);
    }
    this.logger.info({ version: table.version }, 'Saved rate table');
    return ok(undefined);
  }

  async backup(): Promise<Result<string | undefined, Error>> {
    const extension = path.extname(this.filePath);
    const stem = path.basename(this.filePath, extension);
    const timestamp = backupTimestamp(this.clock());

    // Never overwrite an earlier backup; same-millisecond copies get a counter
    for (let attempt = 0; ; attempt++) {
      const suffix = attempt === 0 ? '' : `_${attempt}`;
      const backupPath = path.join(path.dirname(this.filePath), `${stem}.backup.${timestamp}${suffix}${extension || '.yaml'}`);
      try {
        await copyFile(this.filePath, backupPath, constants.COPYFILE_EXCL);
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          continue;
        }
        if (hasErrorCode(error, 'ENOENT')) {
          return ok(undefined);
        }
        return wrapError(error, `Failed to back up ${this.filePath}`);
      }
      this.logger.info({ backupPath }, 'Backed up rate table');
      return ok(backupPath);
    }
  }
}

export class InMemoryRateTableStore implements RateTableStore {
  readonly backups: RateTable[] = [];

  constructor(private table: RateTable | undefined = undefined) {}

  load(): Promise<Result<RateTable, Error>> {
    return Promise.resolve(ok(this.table ?? RateTable.empty()));
  }

  save(table: RateTable): Promise<Result<void, Error>> {
    this.table = table;
    return Promise.resolve(ok(undefined));
  }

  backup(): Promise<Result<string | undefined, Error>> {
    if (!this.table) {
      return Promise.resolve(ok(undefined));
    }
    this.backups.push(this.table);
    return Promise.resolve(ok(`memory:${this.backups.length}`));
  }
}
