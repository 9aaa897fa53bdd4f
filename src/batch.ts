/**
 * Batch Record Processor
 *
 * Runs one lookup strategy over every input key, strictly in order. A key
 * that fails is recorded and the batch moves on; fatal errors and operator
 * interrupts end the batch and leave the in-flight record pending.
 */

import type { LookupStrategy } from './strategies.ts';
import type { Logger } from './utils/logger.ts';
import {
  isScraperError,
  toErrorMessage,
  type ExtractionPayload,
  type LedgerRecord,
  type RecordStatus,
} from './types.ts';
import { sleep, throwIfInterrupted } from './utils/timing.ts';

/**
 * Per-key status plus the payload of every key that succeeded
 */
export class RecordLedger {
  private readonly records: LedgerRecord[];
  private readonly payloads = new Map<string, ExtractionPayload>();

  constructor(keys: readonly string[]) {
    this.records = keys.map((key) => ({ key, status: 'pending' }));
  }

  get length(): number {
    return this.records.length;
  }

  /** Snapshot of the records in input order */
  entries(): LedgerRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  statusAt(index: number): RecordStatus | undefined {
    return this.records[index]?.status;
  }

  succeed(index: number, payload: ExtractionPayload): void {
    const record = this.recordAt(index);
    record.status = 'success';
    this.payloads.set(record.key, payload);
  }

  fail(index: number): void {
    const record = this.recordAt(index);
    record.status = 'fail';
    // A repeated key keeps the payload of an earlier successful attempt
    if (!this.records.some((other) => other.key === record.key && other.status === 'success')) {
      this.payloads.delete(record.key);
    }
  }

  payloadFor(key: string): ExtractionPayload | undefined {
    return this.payloads.get(key);
  }

  /** Successful keys with their payload, once each, in first-seen input order */
  successes(): Array<[string, ExtractionPayload]> {
    const out = new Map<string, ExtractionPayload>();
    for (const record of this.records) {
      const payload = this.payloads.get(record.key);
      if (record.status === 'success' && payload !== undefined && !out.has(record.key)) {
        out.set(record.key, payload);
      }
    }
    return [...out.entries()];
  }

  counts(): { succeeded: number; failed: number; pending: number } {
    let succeeded = 0;
    let failed = 0;
    let pending = 0;
    for (const record of this.records) {
      if (record.status === 'success') succeeded++;
      else if (record.status === 'fail') failed++;
      else pending++;
    }
    return { succeeded, failed, pending };
  }

  private recordAt(index: number): LedgerRecord {
    const record = this.records[index];
    if (!record) {
      throw new RangeError(`No record at index ${index} (ledger has ${this.records.length})`);
    }
    return record;
  }
}

export interface BatchOptions {
  strategy: LookupStrategy;
  ledger: RecordLedger;
  logger: Logger;
  /** Wait between submitting a key and reading its result */
  submitSettleMs: number;
  signal?: AbortSignal;
}

export class BatchRecordProcessor {
  private readonly strategy: LookupStrategy;
  private readonly ledger: RecordLedger;
  private readonly log: Logger;
  private readonly submitSettleMs: number;
  private readonly signal?: AbortSignal;

  constructor(options: BatchOptions) {
    this.strategy = options.strategy;
    this.ledger = options.ledger;
    this.log = options.logger;
    this.submitSettleMs = options.submitSettleMs;
    this.signal = options.signal;
  }

  async process(): Promise<void> {
    const total = this.ledger.length;
    if (total === 0) {
      this.log.info('No keys to process');
      return;
    }

    const records = this.ledger.entries();
    for (const [index, { key }] of records.entries()) {
      throwIfInterrupted(this.signal);
      this.log.info(`[${index + 1}/${total}] Processing key: ${key}`);

      try {
        await this.strategy.navigate(key);
        await sleep(this.submitSettleMs, this.signal);
        const payload = await this.strategy.extract(key);
        this.ledger.succeed(index, payload);
        this.log.info(`Successfully processed key: ${key}`);
      } catch (err) {
        if (isScraperError(err) && err.isFatal) throw err;
        this.ledger.fail(index);
        this.log.error(
          `Error processing key ${key}: ${toErrorMessage(err)}`,
          isScraperError(err) ? { code: err.code } : undefined
        );
      }
    }

    const { succeeded, failed } = this.ledger.counts();
    this.log.info(`Batch finished: ${succeeded} succeeded, ${failed} failed`);
  }
}
