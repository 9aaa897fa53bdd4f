/**
 * Result Persistence Layer
 *
 * Writes a run's output under the data directory. The full write happens on
 * success; the partial write on the failure path carries a run timestamp in
 * every file name so it never overwrites an earlier dump. Each file is
 * written to a temp path and renamed into place.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import type { Logger } from './utils/logger.ts';
import type { ExtractionPayload, LedgerRecord, RowFields } from './types.ts';
import { formatRunTimestamp } from './utils/timing.ts';

export type RunOutput =
  | {
      kind: 'lookup';
      /** Header of the key column in the status CSV (e.g. "ruc") */
      keyColumn: string;
      ledger: LedgerRecord[];
      /** Key → payload pairs in input order */
      results: Array<[string, ExtractionPayload]>;
    }
  | {
      kind: 'registry';
      columns: string[];
      rows: RowFields[];
    };

export interface ResultStoreOptions {
  dataDir: string;
  site: string;
  logger: Logger;
}

/**
 * CSV text for a header plus rows (RFC 4180 quoting, "\n" line ends)
 */
export function toCsv(header: string[], rows: string[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet([header, ...rows]);
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}

/**
 * JSON object text (2-space indent) whose members keep the given order.
 * A plain object would move integer-like keys such as document numbers
 * to the front in ascending order.
 */
export function toOrderedJson(entries: Array<[string, unknown]>): string {
  if (entries.length === 0) return '{}';
  const members = entries.map(
    ([key, value]) => `  ${JSON.stringify(key)}: ${JSON.stringify(value, null, 2).replace(/\n/g, '\n  ')}`
  );
  return `{\n${members.join(',\n')}\n}`;
}

export function ledgerRows(ledger: LedgerRecord[]): string[][] {
  // Never-attempted keys get an empty result cell
  return ledger.map((record) => [record.key, record.status === 'pending' ? '' : record.status]);
}

export class ResultStore {
  private readonly dataDir: string;
  private readonly site: string;
  private readonly log: Logger;

  constructor(options: ResultStoreOptions) {
    this.dataDir = options.dataDir;
    this.site = options.site;
    this.log = options.logger;
  }

  /**
   * Full write after a successful run. Returns the written paths.
   */
  async save(output: RunOutput): Promise<string[]> {
    if (output.kind === 'lookup') {
      return this.writeLookup(output, `${this.site}_scraper_results`, `${this.site}_scraping_results`);
    }
    const base = `${this.site}_scraper_results`;
    return this.writeRegistry(output, base);
  }

  /**
   * Partial write on the failure path, tagged with the failure time
   */
  async savePartial(output: RunOutput, at: Date): Promise<string[]> {
    const base = `${this.site}_scraper_partial_data_${formatRunTimestamp(at)}`;
    const paths =
      output.kind === 'lookup' ? await this.writeLookup(output, base, base) : await this.writeRegistry(output, base);
    this.log.info(`Partial results saved to ${paths.join(', ')}`);
    return paths;
  }

  private async writeLookup(
    output: Extract<RunOutput, { kind: 'lookup' }>,
    dumpBase: string,
    statusBase: string,
  ): Promise<string[]> {
    const dumpPath = await this.writeFileAtomic(`${dumpBase}.json`, `${toOrderedJson(output.results)}\n`);
    const statusPath = await this.writeFileAtomic(
      `${statusBase}.csv`,
      toCsv([output.keyColumn, 'result'], ledgerRows(output.ledger)),
    );
    this.log.info(`Saved ${output.results.length} results and ${output.ledger.length} statuses`);
    return [dumpPath, statusPath];
  }

  private async writeRegistry(output: Extract<RunOutput, { kind: 'registry' }>, base: string): Promise<string[]> {
    const lines = output.rows.map((row) => `${row.join(',')}\n`).join('');
    const textPath = await this.writeFileAtomic(`${base}.txt`, lines);
    const csvPath = await this.writeFileAtomic(`${base}.csv`, toCsv(output.columns, output.rows));
    this.log.info(`Saved ${output.rows.length} rows`);
    return [textPath, csvPath];
  }

  private async writeFileAtomic(name: string, contents: string): Promise<string> {
    await mkdir(this.dataDir, { recursive: true });
    const target = join(this.dataDir, name);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, contents, 'utf-8');
    await rename(temp, target);
    this.log.debug(`Wrote ${target}`);
    return target;
  }
}
