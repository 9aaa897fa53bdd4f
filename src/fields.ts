/**
 * Field fallback chains
 *
 * Sites shift their layout depending on which sections a record has, so a
 * field may live under one of several selectors. Each field lists its
 * selectors in the order they are tried.
 */

import type { BrowserDriver } from './driver.ts';
import type { Logger } from './utils/logger.ts';
import type { FieldMap } from './types.ts';

export interface FieldSpec {
  name: string;
  /** Tried in order; the first one that yields text wins */
  selectors: string[];
  /** A value equal to this (earlier) field's value counts as a miss */
  distinctFrom?: string;
  /** Take the longest candidate across all selectors instead of the first */
  preferLongest?: boolean;
}

/**
 * Resolve one field. Returns null when no selector produced a usable value.
 */
export async function extractField(
  driver: BrowserDriver,
  spec: FieldSpec,
  resolved: FieldMap = {},
): Promise<string | null> {
  const excluded = spec.distinctFrom ? resolved[spec.distinctFrom] : undefined;
  let best: string | null = null;

  for (const selector of spec.selectors) {
    const text = await driver.textOf(selector);
    if (text === null) continue;
    if (excluded !== undefined && excluded !== null && text === excluded) continue;

    if (!spec.preferLongest) return text;
    if (best === null || text.length > best.length) best = text;
  }

  return best;
}

/**
 * Resolve every field of the table, in order (later fields may refer to earlier ones)
 */
export async function extractFields(driver: BrowserDriver, specs: FieldSpec[], logger?: Logger): Promise<FieldMap> {
  const result: FieldMap = {};
  for (const spec of specs) {
    result[spec.name] = await extractField(driver, spec, result);
    if (result[spec.name] === null) {
      logger?.debug(`Field ${spec.name} not found under any of ${spec.selectors.length} selector(s)`);
    }
  }
  return result;
}
