/**
 * Pagination Traversal Engine
 *
 * Dumps a whole results grid: read the current page, then follow the "next"
 * control until it reports disabled. The control state is the only stop
 * condition; the site's advertised page count is informational.
 */

import type { BrowserDriver } from './driver.ts';
import type { Logger } from './utils/logger.ts';
import { createError, type RowFields } from './types.ts';
import { sleep, throwIfInterrupted } from './utils/timing.ts';

export interface GridDefinition {
  table: string;
  /** Cell selector inside each row */
  cell?: string;
  /** Header/decoration rows at the top of every page */
  rowOffset: number;
  /** Leading cells of each row that are not data (row selectors, icons) */
  cellOffset: number;
  next: string;
  /** Element whose text is the advertised total page count */
  totalPages?: string;
}

export interface PaginationOptions {
  driver: BrowserDriver;
  grid: GridDefinition;
  logger: Logger;
  /** Fixed wait after each "next" click; the grid gives no completion signal */
  settleMs: number;
  signal?: AbortSignal;
}

export interface TraversalSummary {
  pages: number;
  rows: number;
  expectedPages: string | null;
}

export class PaginationTraversal {
  private readonly driver: BrowserDriver;
  private readonly grid: GridDefinition;
  private readonly log: Logger;
  private readonly settleMs: number;
  private readonly signal?: AbortSignal;

  constructor(options: PaginationOptions) {
    this.driver = options.driver;
    this.grid = options.grid;
    this.log = options.logger;
    this.settleMs = options.settleMs;
    this.signal = options.signal;
  }

  /**
   * Walk every page, handing each page's rows to `onPage` as soon as it is read
   */
  async traverse(onPage: (rows: RowFields[], page: number) => void): Promise<TraversalSummary> {
    const expectedPages = this.grid.totalPages ? await this.driver.textOf(this.grid.totalPages) : null;
    let page = 1;
    let rowCount = 0;

    for (;;) {
      throwIfInterrupted(this.signal);

      const rows = await this.readPage(page);
      onPage(rows, page);
      rowCount += rows.length;
      this.log.debug(`Page ${page}: ${rows.length} rows`);

      if (!(await this.hasNextPage(page))) break;

      await this.driver.click(this.grid.next);
      page += 1;
      this.log.info(`Processing page ${page} of ${expectedPages ?? '?'}`);
      await sleep(this.settleMs, this.signal);
    }

    this.log.info(`Traversal finished after ${page} page(s), ${rowCount} rows`);
    return { pages: page, rows: rowCount, expectedPages };
  }

  /**
   * Data rows of the current page as flat field lists
   */
  async readPage(page: number): Promise<RowFields[]> {
    const rows = await this.driver.tableRows(this.grid.table, this.grid.cell);
    if (rows === null) {
      throw createError('PAGE_TRANSITION_FAILED', `Results table ${this.grid.table} missing on page ${page}`, {
        url: this.driver.currentUrl(),
      });
    }
    return rows.slice(this.grid.rowOffset).map((cells) => cells.slice(this.grid.cellOffset));
  }

  /**
   * The "next" control carries a disabled attribute on the last page
   */
  async hasNextPage(page: number): Promise<boolean> {
    if (!(await this.driver.exists(this.grid.next))) {
      throw createError('PAGE_TRANSITION_FAILED', `Next control ${this.grid.next} missing on page ${page}`, {
        url: this.driver.currentUrl(),
      });
    }
    return (await this.driver.attributeOf(this.grid.next, 'disabled')) === null;
  }
}
