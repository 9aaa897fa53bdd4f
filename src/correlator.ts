/**
 * Network Event Correlator
 *
 * Recovers response bodies that never reach the DOM. Interception is armed
 * before the form is submitted; afterwards the captured traffic log is drained
 * and requests are joined to responses by request id. The two events can land
 * in the log in either order, so matching is by identity, never by adjacency.
 */

import type { BrowserDriver, TrafficLogEntry } from './driver.ts';
import type { Logger } from './utils/logger.ts';
import { createError, type NetworkExchange } from './types.ts';

/**
 * Glob match on a full URL: `*` is any run of characters, `?` one character
 */
export function matchesUrlPattern(url: string, pattern: string): boolean {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`).test(url);
}

export interface CorrelatorOptions {
  driver: BrowserDriver;
  logger: Logger;
}

export class NetworkEventCorrelator {
  private readonly driver: BrowserDriver;
  private readonly log: Logger;
  private patterns: string[] = [];
  private key: string | undefined;
  private _armed = false;

  constructor(options: CorrelatorOptions) {
    this.driver = options.driver;
    this.log = options.logger;
  }

  get armed(): boolean {
    return this._armed;
  }

  /**
   * Start capturing background traffic for one attempt
   */
  async arm(patterns: string[], key?: string): Promise<void> {
    if (patterns.length === 0) {
      throw new Error('At least one URL pattern is required to arm interception');
    }
    if (this._armed) {
      await this.disarm();
    }

    // Anything left over from a previous attempt is not ours
    const stale = this.driver.drainTrafficLog();
    if (stale.length > 0) {
      this.log.debug(`Discarded ${stale.length} stale traffic entries before arming`);
    }

    await this.driver.enableTrafficCapture();
    this.patterns = [...patterns];
    this.key = key;
    this._armed = true;
    this.log.debug(`Interception armed for ${patterns.join(', ')}`);
  }

  /**
   * Drain the traffic log and return the most recent matched exchange that
   * carries a usable body. Responses are tried newest first; a failed one is
   * logged and the next older one is tried. When none is usable the newest
   * failure is raised.
   */
  async collect(): Promise<NetworkExchange> {
    if (!this._armed) {
      throw new Error('Interception is not armed');
    }

    const entries = this.driver.drainTrafficLog();
    const matchedRequests = new Map<string, string>();
    const responses: TrafficLogEntry[] = [];

    for (const entry of entries) {
      if (entry.method === 'Network.requestWillBeSent') {
        if (this.patterns.some((pattern) => matchesUrlPattern(entry.url, pattern))) {
          matchedRequests.set(entry.requestId, entry.url);
        }
      } else if (entry.method === 'Network.responseReceived') {
        responses.push(entry);
      }
    }

    if (matchedRequests.size === 0) {
      throw createError(
        'NO_MATCHING_EXCHANGE',
        `No background request matching ${this.patterns.join(', ')} among ${entries.length} traffic entries`,
        { key: this.key }
      );
    }

    const matched = responses.filter((response) => matchedRequests.has(response.requestId));
    if (matched.length === 0) {
      throw createError(
        'NO_MATCHING_EXCHANGE',
        `Matched ${matchedRequests.size} request(s) but no response arrived`,
        { key: this.key, url: matchedRequests.values().next().value }
      );
    }

    let newestFailure: unknown;
    for (const response of matched.reverse()) {
      const url = matchedRequests.get(response.requestId) ?? response.url;
      try {
        const exchange = await this.readExchange(response, url);
        this.log.debug(`Correlated ${response.requestId} (${url}) out of ${matched.length} matched response(s)`);
        return exchange;
      } catch (err) {
        this.log.warning(`Skipping response ${response.requestId}: ${(err as Error).message}`);
        newestFailure ??= err;
      }
    }
    throw newestFailure;
  }

  /**
   * Stop capturing and discard whatever is left in the log
   */
  async disarm(): Promise<void> {
    if (!this._armed) return;
    this._armed = false;
    this.patterns = [];
    this.key = undefined;

    try {
      await this.driver.disableTrafficCapture();
    } finally {
      const leftover = this.driver.drainTrafficLog();
      if (leftover.length > 0) {
        this.log.debug(`Discarded ${leftover.length} traffic entries on disarm`);
      }
    }
  }

  private async readExchange(response: TrafficLogEntry, url: string): Promise<NetworkExchange> {
    if (response.status !== undefined && (response.status < 200 || response.status >= 300)) {
      throw createError('PAYLOAD_PARSE_ERROR', `Response for ${url} returned HTTP ${response.status}`, {
        key: this.key,
        url,
      });
    }
    const raw = await this.readBody(response.requestId, url);
    return { requestId: response.requestId, url, status: response.status, body: this.parseBody(raw, url) };
  }

  private async readBody(requestId: string, url: string): Promise<string> {
    try {
      const response = await this.driver.getResponseBody(requestId);
      return response.base64Encoded
        ? Buffer.from(response.body, 'base64').toString('utf-8')
        : response.body;
    } catch (err) {
      throw createError('PAYLOAD_PARSE_ERROR', `Could not read response body for ${url}: ${(err as Error).message}`, {
        key: this.key,
        url,
        cause: err,
      });
    }
  }

  private parseBody(raw: string, url: string): unknown {
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw createError('PAYLOAD_PARSE_ERROR', `Response body for ${url} is not valid JSON`, {
        key: this.key,
        url,
        cause: err,
      });
    }
  }
}
