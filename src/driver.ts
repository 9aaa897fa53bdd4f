/**
 * Browser driver capability set.
 *
 * The orchestration engine only talks to the browser through this interface;
 * `PlaywrightDriver` is the production implementation and the tests use a
 * scripted in-process fake.
 */

import type { ProxyConfig } from './types.ts';
import type { HeaderProfile } from './utils/headers.ts';

export type TrafficEventMethod = 'Network.requestWillBeSent' | 'Network.responseReceived';

/**
 * One entry of the captured background-traffic log
 */
export interface TrafficLogEntry {
  method: TrafficEventMethod;
  requestId: string;
  url: string;
  /** HTTP status, response entries only */
  status?: number;
}

export interface ResponseBody {
  body: string;
  base64Encoded: boolean;
}

export type SelectorState = 'attached' | 'visible';

export interface BrowserDriver {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  /** Resolves false when document.readyState is not "complete" within the timeout */
  waitForDocumentReady(timeoutMs: number): Promise<boolean>;
  /** Resolves false when no element reaches the state within the timeout */
  waitForSelector(selector: string, options: { timeoutMs: number; state?: SelectorState }): Promise<boolean>;
  exists(selector: string): Promise<boolean>;
  /** Clicks the nth match (0-based, default 0); throws when it does not exist */
  click(selector: string, nth?: number): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  selectOption(selector: string, label: string): Promise<void>;
  /** Trimmed rendered text of the first match, null when absent */
  textOf(selector: string): Promise<string | null>;
  /** Attribute of the first match; null when absent or the element is missing */
  attributeOf(selector: string, name: string): Promise<string | null>;
  /** Cell texts per row of the first matching table, null when the table is absent */
  tableRows(tableSelector: string, cellSelector?: string): Promise<string[][] | null>;
  evaluate(script: string): Promise<unknown>;

  clearCookies(): Promise<void>;
  clearCache(): Promise<void>;
  clearStorage(): Promise<void>;
  clearServiceWorkers(): Promise<void>;

  /** Start recording background traffic into the log */
  enableTrafficCapture(): Promise<void>;
  disableTrafficCapture(): Promise<void>;
  /** Return and clear the accumulated traffic log */
  drainTrafficLog(): TrafficLogEntry[];
  getResponseBody(requestId: string): Promise<ResponseBody>;

  close(): Promise<void>;
}

export interface DriverLaunchOptions {
  headless: boolean;
  headers?: HeaderProfile;
  proxy?: ProxyConfig;
}

export type DriverFactory = (options: DriverLaunchOptions) => Promise<BrowserDriver>;
