/**
 * Browser header randomization
 *
 * Fetches one realistic browser header set from the ScrapeOps browser-headers
 * API. Used once at session setup, never during extraction.
 */

import { z } from 'zod';
import type { Logger } from './logger.ts';

export const SCRAPEOPS_HEADERS_URL = 'https://headers.scrapeops.io/v1/browser-headers';

export type BrowserHeaders = Record<string, string>;

export interface HeaderServiceConfig {
  apiKey: string;
  endpoint?: string;
  /** Injected for tests; global fetch by default */
  fetchImpl?: typeof fetch;
}

/** Browser context settings derived from a header set */
export interface HeaderProfile {
  userAgent?: string;
  locale?: string;
  extraHTTPHeaders: Record<string, string>;
}

const headersResponseSchema = z.object({
  result: z.array(z.record(z.string(), z.string())).min(1),
});

/**
 * Headers forwarded as extra HTTP headers (user-agent is set on the context instead)
 */
const FORWARDED_HEADERS = [
  'accept-language',
  'accept',
  'sec-ch-ua',
  'sec-ch-ua-mobile',
  'sec-ch-ua-platform',
  'sec-fetch-dest',
  'sec-fetch-mode',
  'sec-fetch-site',
  'sec-fetch-user',
] as const;

/**
 * Fetch one random header set
 */
export async function fetchRandomHeaders(config: HeaderServiceConfig, logger?: Logger): Promise<BrowserHeaders> {
  const fetchImpl = config.fetchImpl ?? fetch;
  const params = new URLSearchParams({
    api_key: config.apiKey,
    num_results: '1',
  });
  const apiUrl = `${config.endpoint ?? SCRAPEOPS_HEADERS_URL}?${params}`;

  try {
    const response = await fetchImpl(apiUrl);

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`ScrapeOps API error (${response.status}): ${text}`);
    }

    const parsed = headersResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('ScrapeOps API returned no header sets');
    }

    const headers: BrowserHeaders = {};
    for (const [name, value] of Object.entries(parsed.data.result[0] ?? {})) {
      headers[name.toLowerCase()] = value;
    }

    logger?.info('Fetched random browser headers from ScrapeOps');
    return headers;
  } catch (err) {
    logger?.error(`Failed to fetch headers from ScrapeOps: ${(err as Error).message}`);
    if ((err as Error).message.includes('ScrapeOps')) {
      throw err;
    }
    throw new Error(`Failed to fetch headers from ScrapeOps: ${(err as Error).message}`, { cause: err });
  }
}

/**
 * Map a header set onto browser context settings
 */
export function toHeaderProfile(headers: BrowserHeaders, logger?: Logger): HeaderProfile {
  const extraHTTPHeaders: Record<string, string> = {};
  for (const name of FORWARDED_HEADERS) {
    const value = headers[name];
    if (value === undefined) {
      logger?.debug(`Header ${name} not present in header set`);
      continue;
    }
    extraHTTPHeaders[name] = value;
  }

  // "es-PE,es;q=0.9,en;q=0.8" -> "es-PE"
  const locale = headers['accept-language']?.split(',')[0]?.split(';')[0]?.trim() || undefined;

  return {
    userAgent: headers['user-agent'],
    locale,
    extraHTTPHeaders,
  };
}
