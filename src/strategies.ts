/**
 * Extraction strategies
 *
 * A site is pure data; the strategy built from it decides how a record is
 * obtained:
 *  - dom-lookup: submit a key, read fields from the rendered page
 *  - network-lookup: submit a key, read the JSON body of a background request
 *  - registry: submit a search once, dump every page of the results grid
 */

import { ChallengeGate, type ChallengeResponder } from './challenge.ts';
import { NetworkEventCorrelator } from './correlator.ts';
import type { BrowserDriver } from './driver.ts';
import { extractFields, type FieldSpec } from './fields.ts';
import { PageNavigator, type FormDefinition } from './navigator.ts';
import { PaginationTraversal, type GridDefinition, type TraversalSummary } from './pagination.ts';
import type { Logger } from './utils/logger.ts';
import { createError, type ExtractionPayload, type RowFields, type ScraperConfig } from './types.ts';

// ============================================================================
// Site definitions
// ============================================================================

interface SiteBase {
  name: string;
  description: string;
  form: FormDefinition;
}

export interface DomLookupSite extends SiteBase {
  strategy: 'dom-lookup';
  keyColumn: string;
  /** Present once the result for the submitted key has rendered */
  resultContainer: string;
  fields: FieldSpec[];
}

export interface NetworkLookupSite extends SiteBase {
  strategy: 'network-lookup';
  keyColumn: string;
  /** URL globs of the background request that carries the record */
  capture: string[];
  challengePrompt?: string;
}

export interface RegistrySite extends SiteBase {
  strategy: 'registry';
  /** Present once the first results page has rendered */
  resultsReady: string;
  grid: GridDefinition;
  columns: string[];
}

export type SiteDefinition = DomLookupSite | NetworkLookupSite | RegistrySite;

// ============================================================================
// Strategies
// ============================================================================

export interface LookupStrategy {
  kind: 'lookup';
  site: string;
  keyColumn: string;
  navigate(key: string): Promise<void>;
  extract(key: string): Promise<ExtractionPayload>;
}

export interface RegistryStrategy {
  kind: 'registry';
  site: string;
  columns: string[];
  navigate(): Promise<void>;
  /** Rows are handed to `onPage` page by page so a later failure keeps them */
  extract(onPage: (rows: RowFields[], page: number) => void): Promise<TraversalSummary>;
}

export type ExtractionStrategy = LookupStrategy | RegistryStrategy;

export interface StrategyContext {
  driver: BrowserDriver;
  logger: Logger;
  config: Pick<ScraperConfig, 'readyTimeoutMs' | 'pageSettleMs'>;
  /** Required by sites whose form carries a challenge */
  responder?: ChallengeResponder;
  signal?: AbortSignal;
}

export function createStrategy(site: SiteDefinition, context: StrategyContext): ExtractionStrategy {
  switch (site.strategy) {
    case 'dom-lookup':
      return createDomLookup(site, context);
    case 'network-lookup':
      return createNetworkLookup(site, context);
    case 'registry':
      return createRegistryDump(site, context);
  }
}

function isPayload(value: unknown): value is ExtractionPayload {
  return typeof value === 'object' && value !== null;
}

function buildChallenge(site: SiteDefinition, context: StrategyContext): ChallengeGate | undefined {
  if (!site.form.challengeInput) return undefined;
  if (!context.responder) {
    throw createError('CONFIGURATION_ERROR', `Site ${site.name} needs a challenge responder`);
  }
  return new ChallengeGate({
    responder: context.responder,
    logger: context.logger.child('challenge'),
    site: site.name,
    prompt: site.strategy === 'network-lookup' ? site.challengePrompt : undefined,
    signal: context.signal,
  });
}

export function createDomLookup(site: DomLookupSite, context: StrategyContext): LookupStrategy {
  const { driver, logger, config } = context;
  const navigator = new PageNavigator({
    driver,
    form: site.form,
    logger: logger.child('navigator'),
    readyTimeoutMs: config.readyTimeoutMs,
    challenge: buildChallenge(site, context),
    signal: context.signal,
  });

  return {
    kind: 'lookup',
    site: site.name,
    keyColumn: site.keyColumn,
    navigate: (key) => navigator.navigate(key),
    async extract(key) {
      const rendered = await driver.waitForSelector(site.resultContainer, {
        timeoutMs: config.readyTimeoutMs,
        state: 'attached',
      });
      if (!rendered) {
        throw createError('EXTRACTION_FAILED', `Result ${site.resultContainer} did not render`, {
          key,
          url: driver.currentUrl(),
        });
      }
      return extractFields(driver, site.fields, logger);
    },
  };
}

export function createNetworkLookup(site: NetworkLookupSite, context: StrategyContext): LookupStrategy {
  const { driver, logger, config } = context;
  const correlator = new NetworkEventCorrelator({ driver, logger: logger.child('correlator') });
  const navigator = new PageNavigator({
    driver,
    form: site.form,
    logger: logger.child('navigator'),
    readyTimeoutMs: config.readyTimeoutMs,
    challenge: buildChallenge(site, context),
    interception: correlator,
    signal: context.signal,
  });

  return {
    kind: 'lookup',
    site: site.name,
    keyColumn: site.keyColumn,
    async navigate(key) {
      try {
        await navigator.navigate(key, { beforeSubmit: () => correlator.arm(site.capture, key) });
      } catch (err) {
        await correlator.disarm();
        throw err;
      }
    },
    async extract(key) {
      try {
        // A re-issued request supersedes earlier ones
        const latest = await correlator.collect();
        if (!isPayload(latest.body)) {
          throw createError('PAYLOAD_PARSE_ERROR', `Response body for ${latest.url} is not a JSON object or array`, {
            key,
            url: latest.url,
          });
        }
        logger.debug(`Captured payload from ${latest.url}`);
        return latest.body;
      } finally {
        await correlator.disarm();
      }
    },
  };
}

export function createRegistryDump(site: RegistrySite, context: StrategyContext): RegistryStrategy {
  const { driver, logger, config } = context;
  const navigator = new PageNavigator({
    driver,
    form: site.form,
    logger: logger.child('navigator'),
    readyTimeoutMs: config.readyTimeoutMs,
    signal: context.signal,
  });

  return {
    kind: 'registry',
    site: site.name,
    columns: site.columns,
    async navigate() {
      await navigator.openSearch();
      const ready = await driver.waitForSelector(site.resultsReady, { timeoutMs: config.readyTimeoutMs });
      if (!ready) {
        throw createError('NAVIGATION_FAILED', `Results ${site.resultsReady} did not appear after search`, {
          url: driver.currentUrl(),
        });
      }
    },
    extract(onPage) {
      const traversal = new PaginationTraversal({
        driver,
        grid: site.grid,
        logger: logger.child('pagination'),
        settleMs: config.pageSettleMs,
        signal: context.signal,
      });
      return traversal.traverse(onPage);
    },
  };
}
