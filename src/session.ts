/**
 * Session Lifecycle Controller
 *
 * One run against one site with one browser:
 *
 *   init → driver-ready → running → completed
 *     └──────────┴───────────┴────→ failed
 *
 * Success ends in a full write. Any failure (an operator interrupt included)
 * ends in a timestamped partial write of whatever was gathered, after which
 * the error is re-thrown; an interrupt is not. The browser is closed on every
 * path.
 */

import { BatchRecordProcessor, RecordLedger } from './batch.ts';
import { createConsoleResponder, type ChallengeResponder } from './challenge.ts';
import type { BrowserDriver, DriverFactory } from './driver.ts';
import { ResultStore, type RunOutput } from './persistence.ts';
import { createStrategy, type SiteDefinition } from './strategies.ts';
import { fetchRandomHeaders, toHeaderProfile, type HeaderProfile } from './utils/headers.ts';
import type { Logger } from './utils/logger.ts';
import { getProxyErrorMessage, isProxyError } from './utils/proxy.ts';
import { formatDuration, throwIfInterrupted } from './utils/timing.ts';
import {
  createError,
  isInterrupt,
  toErrorMessage,
  type RowFields,
  type RunSummary,
  type ScraperConfig,
  type SessionState,
} from './types.ts';

export interface SessionOptions {
  site: SiteDefinition;
  config: ScraperConfig;
  /** Lookup keys; required by lookup sites, ignored by registry sites */
  keys?: readonly string[];
  logger: Logger;
  driverFactory: DriverFactory;
  /** Terminal prompt by default */
  responder?: ChallengeResponder;
  signal?: AbortSignal;
  /** Used for the header service call */
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export class SessionController {
  private readonly site: SiteDefinition;
  private readonly config: ScraperConfig;
  private readonly log: Logger;
  private readonly driverFactory: DriverFactory;
  private readonly responder: ChallengeResponder;
  private readonly signal?: AbortSignal;
  private readonly fetchImpl?: typeof fetch;
  private readonly now: () => Date;
  private readonly store: ResultStore;
  private readonly ledger: RecordLedger;
  private readonly rows: RowFields[] = [];

  private _state: SessionState = 'init';
  private driver: BrowserDriver | null = null;

  constructor(options: SessionOptions) {
    this.site = options.site;
    this.config = options.config;
    this.log = options.logger;
    this.driverFactory = options.driverFactory;
    this.responder = options.responder ?? createConsoleResponder();
    this.signal = options.signal;
    this.fetchImpl = options.fetchImpl;
    this.now = options.now ?? (() => new Date());
    this.store = new ResultStore({
      dataDir: options.config.dataDir,
      site: options.site.name,
      logger: options.logger.child('persistence'),
    });

    if (this.site.strategy === 'registry') {
      if (options.keys && options.keys.length > 0) {
        this.log.warning(`Site ${this.site.name} dumps the whole registry; ${options.keys.length} keys ignored`);
      }
      this.ledger = new RecordLedger([]);
    } else {
      if (!options.keys || options.keys.length === 0) {
        throw createError('CONFIGURATION_ERROR', `Site ${this.site.name} needs at least one ${this.site.keyColumn} key`);
      }
      this.ledger = new RecordLedger(options.keys);
    }
  }

  get state(): SessionState {
    return this._state;
  }

  async run(): Promise<RunSummary> {
    const startedAt = this.now();
    const startMs = Date.now();
    this._state = 'init';
    let files: string[] = [];

    this.log.info(`Starting ${this.site.name} scraper`, { keys: this.ledger.length, headless: this.config.headless });

    try {
      throwIfInterrupted(this.signal);
      this.driver = await this.setup();
      this._state = 'driver-ready';

      this._state = 'running';
      await this.execute(this.driver);

      this._state = 'completed';
      files = await this.store.save(this.output());
      this.log.info(`Results saved to ${files.join(', ')}`);
    } catch (err) {
      this._state = 'failed';
      if (isInterrupt(err)) {
        this.log.warning('Scraping interrupted by operator');
      } else {
        this.log.error(`Scraping failed: ${toErrorMessage(err)}`);
      }

      try {
        files = await this.store.savePartial(this.output(), this.now());
      } catch (saveErr) {
        this.log.error(`Failed to save partial results: ${toErrorMessage(saveErr)}`);
      }

      if (!isInterrupt(err)) throw err;
    } finally {
      await this.teardown();
      this.log.info(`Total execution time: ${formatDuration(Date.now() - startMs)}`);
    }

    const { succeeded, failed } = this.ledger.counts();
    return {
      site: this.site.name,
      state: this._state,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startMs,
      succeeded,
      failed,
      rows: this.rows.length,
      files,
    };
  }

  /**
   * Snapshot of everything gathered so far
   */
  output(): RunOutput {
    if (this.site.strategy === 'registry') {
      return { kind: 'registry', columns: this.site.columns, rows: [...this.rows] };
    }
    return {
      kind: 'lookup',
      keyColumn: this.site.keyColumn,
      ledger: this.ledger.entries(),
      results: this.ledger.successes(),
    };
  }

  private async setup(): Promise<BrowserDriver> {
    const proxy = this.config.proxy;
    try {
      let headers: HeaderProfile | undefined;
      if (this.config.scrapeOpsApiKey) {
        const fetched = await fetchRandomHeaders(
          { apiKey: this.config.scrapeOpsApiKey, fetchImpl: this.fetchImpl },
          this.log.child('headers'),
        );
        headers = toHeaderProfile(fetched, this.log.child('headers'));
      } else {
        this.log.info('No SCRAPEOPS_API_KEY set, using default browser headers');
      }

      if (proxy) {
        this.log.info(`Using proxy: ${proxy.server}`);
      }
      const driver = await this.driverFactory({ headless: this.config.headless, headers, proxy });
      this.log.info('Browser session ready');
      return driver;
    } catch (err) {
      const message =
        err instanceof Error && proxy && isProxyError(err) ? getProxyErrorMessage(err, proxy.server) : toErrorMessage(err);
      throw createError('SETUP_FAILED', `Failed to set up browser session: ${message}`, { cause: err });
    }
  }

  private async execute(driver: BrowserDriver): Promise<void> {
    const strategy = createStrategy(this.site, {
      driver,
      logger: this.log.child(this.site.name),
      config: this.config,
      responder: this.responder,
      signal: this.signal,
    });

    if (strategy.kind === 'lookup') {
      const processor = new BatchRecordProcessor({
        strategy,
        ledger: this.ledger,
        logger: this.log.child('batch'),
        submitSettleMs: this.config.submitSettleMs,
        signal: this.signal,
      });
      await processor.process();
      return;
    }

    await strategy.navigate();
    const summary = await strategy.extract((rows) => {
      this.rows.push(...rows);
    });
    this.log.info(`Collected ${summary.rows} rows from ${summary.pages} page(s)`, {
      expectedPages: summary.expectedPages,
    });
  }

  private async teardown(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    if (!driver) return;
    try {
      await driver.close();
      this.log.debug('Browser closed');
    } catch (err) {
      this.log.warning(`Error while closing browser: ${toErrorMessage(err)}`);
    }
  }
}
