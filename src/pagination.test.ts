/**
 * Unit tests for the pagination traversal engine
 */

import { describe, test, expect } from 'vitest';
import { PaginationTraversal, type GridDefinition } from './pagination.ts';
import { isScraperError, type RowFields } from './types.ts';
import { FakeDriver, createMemoryLogger } from '../tests/support/fake-driver.ts';

const grid: GridDefinition = {
  table: 'table.grid',
  rowOffset: 1,
  cellOffset: 1,
  next: '#next',
  totalPages: '#total',
};

function pageTable(page: number): string[][] {
  return [
    ['', 'id', 'name'],
    ['>', `${page}-1`, `Name ${page}.1`],
    ['>', `${page}-2`, `Name ${page}.2`],
  ];
}

/**
 * Grid of `pages` pages; the next control is disabled on the last one
 */
function pagedDriver(pages: number, advertised: string): FakeDriver {
  const driver = new FakeDriver();
  let current = 1;
  const render = () => {
    driver.page = {
      texts: { '#total': advertised },
      tables: { 'table.grid': pageTable(current) },
      attributes: { '#next': current === pages ? { disabled: 'disabled' } : {} },
    };
  };
  render();
  driver.hooks.click = (selector) => {
    if (selector === '#next') {
      current += 1;
      render();
    }
  };
  return driver;
}

describe('PaginationTraversal', () => {
  test('stops on the disabled control, not on the advertised total', async () => {
    const driver = pagedDriver(3, '5');
    const { logger, lines } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0 });

    const collected: RowFields[] = [];
    const summary = await traversal.traverse((rows) => collected.push(...rows));

    expect(summary).toEqual({ pages: 3, rows: 6, expectedPages: '5' });
    expect(collected).toEqual([
      ['1-1', 'Name 1.1'],
      ['1-2', 'Name 1.2'],
      ['2-1', 'Name 2.1'],
      ['2-2', 'Name 2.2'],
      ['3-1', 'Name 3.1'],
      ['3-2', 'Name 3.2'],
    ]);
    expect(driver.calls).toEqual(['click #next', 'click #next']);
    expect(lines.some((line) => line.includes('Processing page 3 of 5'))).toBe(true);
  });

  test('continues past an advertised total that is too small', async () => {
    const driver = pagedDriver(3, '1');
    const { logger } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0 });

    const summary = await traversal.traverse(() => {});
    expect(summary.pages).toBe(3);
  });

  test('a single page never clicks next', async () => {
    const driver = pagedDriver(1, '1');
    const { logger } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0 });

    const summary = await traversal.traverse(() => {});
    expect(summary).toEqual({ pages: 1, rows: 2, expectedPages: '1' });
    expect(driver.calls).toEqual([]);
  });

  test('a missing table is a fatal page transition failure', async () => {
    const driver = pagedDriver(3, '3');
    driver.hooks.click = () => {
      driver.page = { attributes: { '#next': {} } };
    };
    const { logger } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0 });

    const pages: number[] = [];
    const error = await traversal.traverse((_rows, page) => pages.push(page)).catch((err: unknown) => err);

    expect(isScraperError(error, 'PAGE_TRANSITION_FAILED')).toBe(true);
    expect(isScraperError(error) && error.isFatal).toBe(true);
    expect(pages).toEqual([1]);
  });

  test('a missing next control is a fatal page transition failure', async () => {
    const driver = new FakeDriver();
    driver.page = { tables: { 'table.grid': pageTable(1) } };
    const { logger } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0 });

    await expect(traversal.traverse(() => {})).rejects.toMatchObject({ code: 'PAGE_TRANSITION_FAILED' });
  });

  test('an aborted signal stops before the next page is read', async () => {
    const driver = pagedDriver(3, '3');
    const controller = new AbortController();
    const { logger } = createMemoryLogger();
    const traversal = new PaginationTraversal({ driver, grid, logger, settleMs: 0, signal: controller.signal });

    const pages: number[] = [];
    const run = traversal.traverse((_rows, page) => {
      pages.push(page);
      if (page === 2) controller.abort();
    });

    await expect(run).rejects.toMatchObject({ code: 'INTERRUPTED' });
    expect(pages).toEqual([1, 2]);
  });
});
