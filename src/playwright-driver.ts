/**
 * Playwright (Chromium) browser driver
 *
 * Background traffic is read from a dedicated CDP session: while capture is
 * enabled, request and response events are appended to an in-memory log that
 * the network correlator drains after each submission.
 */

import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type CDPSession,
  type LaunchOptions,
  type Page,
} from 'playwright-core';
import type { Logger } from './utils/logger.ts';
import type {
  BrowserDriver,
  DriverLaunchOptions,
  ResponseBody,
  SelectorState,
  TrafficLogEntry,
} from './driver.ts';

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-dev-shm-usage',
  '--disable-notifications',
];

// Modest viewport sizes for headless runs (not fullscreen)
const VIEWPORTS = [
  { width: 1280, height: 720 },
  { width: 1366, height: 768 },
  { width: 1440, height: 900 },
];

const ACTION_TIMEOUT_MS = 10000;

function isTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

/**
 * Chromium launch settings. Playwright's own SIGINT/SIGTERM handlers would
 * close the browser and exit the process before the session writes its
 * partial dump, so shutdown stays with the caller's abort signal.
 */
export function launchOptions(options: DriverLaunchOptions): LaunchOptions {
  return {
    headless: options.headless,
    timeout: 60000,
    handleSIGINT: false,
    handleSIGTERM: false,
    args: options.headless ? LAUNCH_ARGS : [...LAUNCH_ARGS, '--start-maximized'],
    proxy: options.proxy
      ? { server: options.proxy.server, username: options.proxy.username, password: options.proxy.password }
      : undefined,
  };
}

export class PlaywrightDriver implements BrowserDriver {
  private capturing = false;
  private trafficLog: TrafficLogEntry[] = [];

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly cdp: CDPSession,
    private readonly log: Logger,
  ) {
    this.cdp.on('Network.requestWillBeSent', (event) => {
      if (!this.capturing) return;
      this.trafficLog.push({
        method: 'Network.requestWillBeSent',
        requestId: event.requestId,
        url: event.request.url,
      });
    });
    this.cdp.on('Network.responseReceived', (event) => {
      if (!this.capturing) return;
      this.trafficLog.push({
        method: 'Network.responseReceived',
        requestId: event.requestId,
        url: event.response.url,
        status: event.response.status,
      });
    });
  }

  /**
   * Launch Chromium with the session's header profile and proxy
   */
  static async launch(options: DriverLaunchOptions, log: Logger): Promise<PlaywrightDriver> {
    const browser = await chromium.launch(launchOptions(options));

    try {
      const viewport = VIEWPORTS[Math.floor(Math.random() * VIEWPORTS.length)] ?? VIEWPORTS[0];
      const context = await browser.newContext({
        userAgent: options.headers?.userAgent,
        locale: options.headers?.locale,
        extraHTTPHeaders: options.headers?.extraHTTPHeaders,
        viewport: options.headless ? viewport : null,
      });
      const page = await context.newPage();
      page.setDefaultTimeout(ACTION_TIMEOUT_MS);
      const cdp = await context.newCDPSession(page);

      log.info(`Chromium ${browser.version()} started${options.proxy ? ` via proxy ${options.proxy.server}` : ''}`);
      return new PlaywrightDriver(browser, context, page, cdp, log);
    } catch (err) {
      await browser.close().catch((closeErr: Error) => log.debug(`Error closing browser: ${closeErr.message}`));
      throw err;
    }
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: 60000 });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async waitForDocumentReady(timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForFunction(() => document.readyState === 'complete', undefined, { timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  async waitForSelector(selector: string, options: { timeoutMs: number; state?: SelectorState }): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: options.state ?? 'visible', timeout: options.timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  async click(selector: string, nth = 0): Promise<void> {
    const matches = this.page.locator(selector);
    const count = await matches.count();
    if (count <= nth) {
      throw new Error(`No element matches ${selector} (index ${nth}, found ${count})`);
    }
    await matches.nth(nth).click();
  }

  async fill(selector: string, value: string): Promise<void> {
    const input = this.page.locator(selector).first();
    if ((await input.count()) === 0) {
      throw new Error(`No element matches ${selector}`);
    }
    await input.fill(value);
  }

  async selectOption(selector: string, label: string): Promise<void> {
    const select = this.page.locator(selector).first();
    if ((await select.count()) === 0) {
      throw new Error(`No element matches ${selector}`);
    }
    await select.selectOption({ label });
  }

  async textOf(selector: string): Promise<string | null> {
    const element = await this.page.$(selector);
    if (!element) return null;
    return (await element.innerText()).trim();
  }

  async attributeOf(selector: string, name: string): Promise<string | null> {
    const element = await this.page.$(selector);
    if (!element) return null;
    return element.getAttribute(name);
  }

  async tableRows(tableSelector: string, cellSelector = 'td'): Promise<string[][] | null> {
    const table = await this.page.$(tableSelector);
    if (!table) return null;
    return table.$$eval(
      'tr',
      (rows, cells) => rows.map((row) =>
        Array.from(row.querySelectorAll<HTMLElement>(cells)).map((cell) => cell.innerText.trim())
      ),
      cellSelector,
    );
  }

  async evaluate(script: string): Promise<unknown> {
    return this.page.evaluate(script);
  }

  async clearCookies(): Promise<void> {
    await this.context.clearCookies();
  }

  async clearCache(): Promise<void> {
    await this.cdp.send('Network.clearBrowserCache');
  }

  async clearStorage(): Promise<void> {
    const url = this.page.url();
    if (!url.startsWith('http')) return;

    await this.page.evaluate('window.localStorage.clear(); window.sessionStorage.clear();');
    await this.cdp.send('Storage.clearDataForOrigin', {
      origin: new URL(url).origin,
      storageTypes: 'all',
    });
  }

  async clearServiceWorkers(): Promise<void> {
    await this.cdp.send('ServiceWorker.enable');
    await this.cdp.send('ServiceWorker.stopAllWorkers');
    await this.cdp.send('ServiceWorker.disable');
  }

  async enableTrafficCapture(): Promise<void> {
    await this.cdp.send('Network.enable');
    this.capturing = true;
  }

  async disableTrafficCapture(): Promise<void> {
    this.capturing = false;
    await this.cdp.send('Network.disable');
  }

  drainTrafficLog(): TrafficLogEntry[] {
    return this.trafficLog.splice(0, this.trafficLog.length);
  }

  async getResponseBody(requestId: string): Promise<ResponseBody> {
    const result = await this.cdp.send('Network.getResponseBody', { requestId });
    return { body: result.body, base64Encoded: result.base64Encoded };
  }

  async close(): Promise<void> {
    const report = (what: string) => (err: Error) => this.log.debug(`Error closing ${what}: ${err.message}`);
    await this.cdp.detach().catch(report('CDP session'));
    await this.page.close().catch(report('page'));
    await this.context.close().catch(report('context'));
    await this.browser.close().catch(report('browser'));
    this.log.info('Browser closed');
  }
}

/**
 * Driver factory used by the session controller in production
 */
export function createPlaywrightDriverFactory(log: Logger) {
  return (options: DriverLaunchOptions): Promise<BrowserDriver> => PlaywrightDriver.launch(options, log);
}
