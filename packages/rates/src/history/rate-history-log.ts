import { createReadStream, existsSync } from 'node:fs';
import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';

import { wrapError } from '@posledger/core';
import { getLogger, type Logger } from '@posledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { RateChangeSchema, type RateChange } from './rate-history.schemas.js';

export const RATE_HISTORY_FILENAME = 'rate_history.jsonl';

/**
 * Append-only audit trail of rate changes.
 */
export interface RateHistoryLog {
  /** Appends all records or none */
  append(changes: readonly RateChange[]): Promise<Result<void, Error>>;
  /** Every record, oldest first */
  readAll(): Promise<Result<RateChange[], Error>>;
}

/**
 * JSONL history file, one change per line:
 *
 * {"timestamp":"2024-03-01T10:00:00.000Z","version":4,"changeType":"update","actor":"cli","bank":"vakifbank","installment":1,"oldRate":"0.0336","newRate":"0.0349"}
 *
 * Writes go through a queue so concurrent appends never interleave, and a
 * batch is written with a single append call.
 */
export class JsonlRateHistoryLog implements RateHistoryLog {
  private readonly logger: Logger;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {
    this.logger = getLogger('RateHistoryLog');
  }

  getFilePath(): string {
    return this.filePath;
  }

  append(changes: readonly RateChange[]): Promise<Result<void, Error>> {
    const run = this.writeQueue.then(() => this.appendImpl(changes));
    // The caller sees a rejection through `run`; later appends still proceed
    this.writeQueue = run.catch((error: unknown) => this.logger.error({ error }, 'History append rejected'));
    return run;
  }

  async readAll(): Promise<Result<RateChange[], Error>> {
    try {
      if (!existsSync(this.filePath)) {
        this.logger.debug({ filePath: this.filePath }, 'History file does not exist, returning empty history');
        return ok([]);
      }

      const changes: RateChange[] = [];
      const lines = createInterface({
        crlfDelay: Number.POSITIVE_INFINITY,
        input: createReadStream(this.filePath, 'utf-8'),
      });

      let lineNumber = 0;
      for await (const line of lines) {
        lineNumber++;
        if (!line.trim()) continue;

        let parsed: unknown;
        try {
          parsed = JSON.parse(line);
        } catch (parseError) {
          this.logger.warn({ error: parseError, lineNumber }, 'Failed to parse JSONL line, skipping');
          continue;
        }

        const validation = RateChangeSchema.safeParse(parsed);
        if (!validation.success) {
          this.logger.warn({ error: validation.error, lineNumber }, 'Invalid rate change in JSONL, skipping');
          continue;
        }
        changes.push(validation.data);
      }

      return ok(changes);
    } catch (error) {
      return wrapError(error, 'Failed to read rate history');
    }
  }

  private async appendImpl(changes: readonly RateChange[]): Promise<Result<void, Error>> {
    if (changes.length === 0) {
      return ok(undefined);
    }

    for (const change of changes) {
      const validation = RateChangeSchema.safeParse(change);
      if (!validation.success) {
        return err(new Error(`Invalid rate change: ${validation.error.message}`));
      }
    }

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, changes.map((change) => `${JSON.stringify(change)}\n`).join(''), 'utf-8');
    } catch (error) {
      return wrapError(error, 'Failed to append rate history');
    }

    this.logger.info({ count: changes.length, version: changes[0]?.version }, 'Appended rate changes');
    return ok(undefined);
  }
}

export class InMemoryRateHistoryLog implements RateHistoryLog {
  private readonly changes: RateChange[] = [];

  append(changes: readonly RateChange[]): Promise<Result<void, Error>> {
    this.changes.push(...changes);
    return Promise.resolve(ok(undefined));
  }

  readAll(): Promise<Result<RateChange[], Error>> {
    return Promise.resolve(ok([...this.changes]));
  }
}
