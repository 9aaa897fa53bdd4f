/**
 * Portal Record Scraper - Main Entry Point
 *
 * Drives a browser through government lookup portals: one session per site,
 * one strategy per site (DOM lookup, background-response lookup or registry
 * dump), per-key failure isolation, and partial dumps on failure.
 *
 * @example Lookup batch
 * ```typescript
 * import { SessionController, createLogger, createPlaywrightDriverFactory, getSite, loadConfig } from 'portal-record-scraper';
 *
 * const config = loadConfig();
 * const logger = createLogger({ level: config.logLevel });
 * const session = new SessionController({
 *   site: getSite('sunat'),
 *   config,
 *   keys: ['20100000001'],
 *   logger,
 *   driverFactory: createPlaywrightDriverFactory(logger),
 * });
 * const summary = await session.run();
 * ```
 */

// Orchestration
export { SessionController } from './session.ts';
export type { SessionOptions } from './session.ts';
export { BatchRecordProcessor, RecordLedger } from './batch.ts';
export type { BatchOptions } from './batch.ts';
export { PageNavigator } from './navigator.ts';
export type { FormDefinition, FormStep, NavigationHooks, PageNavigatorOptions } from './navigator.ts';
export { ChallengeGate, createConsoleResponder } from './challenge.ts';
export type { ChallengeGateOptions, ChallengeRequest, ChallengeResponder } from './challenge.ts';
export { NetworkEventCorrelator, matchesUrlPattern } from './correlator.ts';
export { PaginationTraversal } from './pagination.ts';
export type { GridDefinition, PaginationOptions, TraversalSummary } from './pagination.ts';
export { ResultStore, ledgerRows, toCsv, toOrderedJson } from './persistence.ts';
export type { RunOutput } from './persistence.ts';

// Strategies & sites
export { createStrategy, createDomLookup, createNetworkLookup, createRegistryDump } from './strategies.ts';
export type {
  DomLookupSite,
  ExtractionStrategy,
  LookupStrategy,
  NetworkLookupSite,
  RegistrySite,
  RegistryStrategy,
  SiteDefinition,
  StrategyContext,
} from './strategies.ts';
export { extractField, extractFields } from './fields.ts';
export type { FieldSpec } from './fields.ts';
export { SITES, getSite, siteNames, redjum, reinfo, sunat } from './sites/index.ts';

// Browser
export { PlaywrightDriver, createPlaywrightDriverFactory } from './playwright-driver.ts';
export type {
  BrowserDriver,
  DriverFactory,
  DriverLaunchOptions,
  ResponseBody,
  SelectorState,
  TrafficLogEntry,
} from './driver.ts';

// Types
export type {
  ExtractionPayload,
  FieldMap,
  LedgerRecord,
  LogLevel,
  NetworkExchange,
  ProxyConfig,
  RecordStatus,
  RowFields,
  RunSummary,
  ScraperConfig,
  ScraperErrorCode,
  ScraperErrorDetails,
  SessionState,
} from './types.ts';

// Errors
export { ScraperError, createError, isInterrupt, isScraperError, toErrorMessage } from './types.ts';

// Configuration & utilities
export { loadConfig } from './config.ts';
export type { ConfigOverrides } from './config.ts';
export { createLogger, formatMessage, isLogLevel } from './utils/logger.ts';
export type { Logger, LoggerOptions } from './utils/logger.ts';
export { parseKeysCsv, readKeysFile } from './utils/keys.ts';
export { fetchRandomHeaders, toHeaderProfile, SCRAPEOPS_HEADERS_URL } from './utils/headers.ts';
export type { BrowserHeaders, HeaderProfile, HeaderServiceConfig } from './utils/headers.ts';
export { parseProxyFromEnv, parseProxyUrl, resolveProxyConfig, isProxyError, getProxyErrorMessage } from './utils/proxy.ts';
export { sleep, formatRunTimestamp, formatDuration } from './utils/timing.ts';
