/**
 * Page Navigator
 *
 * Drives the browser to a site's search form and submits one key. Every
 * navigation starts from a clean browser (cookies, cache, storage, service
 * workers, pending traffic) so keys sharing one browser never see each
 * other's state.
 */

import type { BrowserDriver } from './driver.ts';
import type { ChallengeGate } from './challenge.ts';
import type { NetworkEventCorrelator } from './correlator.ts';
import type { Logger } from './utils/logger.ts';
import { createError, isScraperError } from './types.ts';
import { sleep } from './utils/timing.ts';

export type FormStep =
  | { action: 'click'; selector: string; nth?: number; description?: string }
  | { action: 'select'; selector: string; label: string; description?: string }
  | { action: 'wait'; ms: number };

export interface FormDefinition {
  url: string;
  /** Control that must be visible before the form is touched */
  readySelector: string;
  /** Fixed delay after the page load, for single-page apps that render late */
  loadDelayMs?: number;
  /** Run in order before the key is typed */
  steps?: FormStep[];
  keyInput?: string;
  /** Present when the site gates submission behind a challenge */
  challengeInput?: string;
  submit: string;
}

export interface NavigationHooks {
  /** Runs right before the submit click (e.g. arming interception) */
  beforeSubmit?: () => Promise<void>;
}

export interface PageNavigatorOptions {
  driver: BrowserDriver;
  form: FormDefinition;
  logger: Logger;
  readyTimeoutMs: number;
  challenge?: ChallengeGate;
  interception?: NetworkEventCorrelator;
  signal?: AbortSignal;
}

export class PageNavigator {
  private readonly driver: BrowserDriver;
  private readonly form: FormDefinition;
  private readonly log: Logger;
  private readonly readyTimeoutMs: number;
  private readonly challenge?: ChallengeGate;
  private readonly interception?: NetworkEventCorrelator;
  private readonly signal?: AbortSignal;

  constructor(options: PageNavigatorOptions) {
    this.driver = options.driver;
    this.form = options.form;
    this.log = options.logger;
    this.readyTimeoutMs = options.readyTimeoutMs;
    this.challenge = options.challenge;
    this.interception = options.interception;
    this.signal = options.signal;

    if (this.form.challengeInput && !this.challenge) {
      throw createError('CONFIGURATION_ERROR', `Form at ${this.form.url} needs a challenge gate`);
    }
  }

  /**
   * Reset browser state, load the form, fill `key` and submit
   */
  async navigate(key: string, hooks: NavigationHooks = {}): Promise<void> {
    await this.run(key, async () => {
      await this.resetBrowserState();
      await this.load(key);
      await this.runSteps();

      if (!this.form.keyInput) {
        throw createError('CONFIGURATION_ERROR', `Form at ${this.form.url} has no key input`);
      }
      await this.driver.fill(this.form.keyInput, key);
      this.log.info(`Inserting key: ${key}`);

      if (this.form.challengeInput && this.challenge) {
        const solution = await this.challenge.resolve(key);
        await this.driver.fill(this.form.challengeInput, solution);
      }

      await hooks.beforeSubmit?.();
      await this.driver.click(this.form.submit);
      this.log.debug(`Submitted form for key ${key}`);
    });
  }

  /**
   * Reset, load the form, apply its filter steps and submit without a key
   */
  async openSearch(hooks: NavigationHooks = {}): Promise<void> {
    await this.run(undefined, async () => {
      await this.resetBrowserState();
      await this.load(undefined);
      this.log.info('Setting search filters...');
      await this.runSteps();
      await hooks.beforeSubmit?.();
      await this.driver.click(this.form.submit);
      this.log.info('Search submitted');
    });
  }

  /**
   * Clear everything a previous key may have left behind. Each step is
   * independent; a step the current page does not support is skipped.
   */
  async resetBrowserState(): Promise<void> {
    if (this.interception?.armed) {
      await this.interception.disarm();
    }

    const steps: Array<[string, () => Promise<unknown>]> = [
      ['cache', () => this.driver.clearCache()],
      ['cookies', () => this.driver.clearCookies()],
      ['storage', () => this.driver.clearStorage()],
      ['service workers', () => this.driver.clearServiceWorkers()],
      ['blank page', () => this.driver.goto('about:blank')],
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (err) {
        this.log.debug(`Cleanup of ${name} skipped: ${(err as Error).message}`);
      }
    }

    const pending = this.driver.drainTrafficLog();
    if (pending.length > 0) {
      this.log.debug(`Dropped ${pending.length} pending traffic entries`);
    }
    this.log.debug('Completed full browser data cleanup');
  }

  private async load(key: string | undefined): Promise<void> {
    await this.driver.goto(this.form.url);
    if (this.form.loadDelayMs) {
      await sleep(this.form.loadDelayMs, this.signal);
    }

    const complete = await this.driver.waitForDocumentReady(this.readyTimeoutMs);
    if (!complete) {
      this.log.warning('Page might not be fully loaded, attempting to proceed anyway');
    }

    const ready = await this.driver.waitForSelector(this.form.readySelector, {
      timeoutMs: this.readyTimeoutMs,
      state: 'visible',
    });
    if (!ready) {
      throw createError(
        'NAVIGATION_FAILED',
        `Control ${this.form.readySelector} did not appear within ${this.readyTimeoutMs}ms`,
        { key, url: this.form.url }
      );
    }
  }

  private async runSteps(): Promise<void> {
    for (const step of this.form.steps ?? []) {
      switch (step.action) {
        case 'click':
          await this.driver.click(step.selector, step.nth);
          if (step.description) this.log.info(step.description);
          break;
        case 'select':
          await this.driver.selectOption(step.selector, step.label);
          if (step.description) this.log.info(step.description);
          break;
        case 'wait':
          await sleep(step.ms, this.signal);
          break;
      }
    }
  }

  /**
   * Driver failures while navigating are NAVIGATION_FAILED for that key;
   * errors that already carry a code keep it.
   */
  private async run(key: string | undefined, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (err) {
      if (isScraperError(err)) throw err;
      throw createError('NAVIGATION_FAILED', `Navigation failed: ${(err as Error).message}`, {
        key,
        url: this.form.url,
        cause: err,
      });
    }
  }
}
