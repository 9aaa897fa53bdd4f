/**
 * Type definitions for the portal record scraper
 */

// ============================================================================
// Error Types
// ============================================================================

export type ScraperErrorCode =
  | 'SETUP_FAILED'            // Browser/session could not start
  | 'CONFIGURATION_ERROR'     // Missing keys, invalid env, unknown site
  | 'NAVIGATION_FAILED'       // Readiness control missing or selector changed
  | 'CHALLENGE_FAILED'        // Challenge responder could not provide a solution
  | 'NO_MATCHING_EXCHANGE'    // No background request matched the URL pattern
  | 'PAYLOAD_PARSE_ERROR'     // Matched response body is not the expected format
  | 'EXTRACTION_FAILED'       // Result container absent after submission
  | 'PAGE_TRANSITION_FAILED'  // Results table or "next" control absent
  | 'INTERRUPTED';            // Operator cancelled the run

export interface ScraperErrorDetails {
  code: ScraperErrorCode;
  message: string;
  key?: string;
  url?: string;
  timestamp: string;
  cause?: unknown;
}

const FATAL_CODES: readonly ScraperErrorCode[] = [
  'SETUP_FAILED',
  'CONFIGURATION_ERROR',
  'PAGE_TRANSITION_FAILED',
  'INTERRUPTED',
];

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;
  readonly key?: string;
  readonly url?: string;
  readonly timestamp: string;

  constructor(details: ScraperErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ScraperError';
    this.code = details.code;
    this.key = details.key;
    this.url = details.url;
    this.timestamp = details.timestamp;

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScraperError);
    }
  }

  toJSON(): Omit<ScraperErrorDetails, 'cause'> {
    return {
      code: this.code,
      message: this.message,
      key: this.key,
      url: this.url,
      timestamp: this.timestamp,
    };
  }

  /** Aborts the whole run rather than a single key */
  get isFatal(): boolean {
    return FATAL_CODES.includes(this.code);
  }
}

/**
 * Create a ScraperError with consistent formatting
 */
export function createError(
  code: ScraperErrorCode,
  message: string,
  options: { key?: string; url?: string; cause?: unknown } = {}
): ScraperError {
  return new ScraperError({
    code,
    message,
    key: options.key,
    url: options.url,
    cause: options.cause,
    timestamp: new Date().toISOString(),
  });
}

export function isScraperError(err: unknown, code?: ScraperErrorCode): err is ScraperError {
  return err instanceof ScraperError && (code === undefined || err.code === code);
}

export function isInterrupt(err: unknown): boolean {
  return isScraperError(err, 'INTERRUPTED');
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ============================================================================
// Records & Results
// ============================================================================

export type RecordStatus = 'pending' | 'success' | 'fail';

export interface LedgerRecord {
  key: string;
  status: RecordStatus;
}

/** Field name → extracted value; null when every selector of the field failed */
export type FieldMap = Record<string, string | null>;

/** Structured payload for one key: a DOM field map or a parsed JSON body */
export type ExtractionPayload = FieldMap | Record<string, unknown> | unknown[];

/** One grid row, cells in column order */
export type RowFields = string[];

export interface NetworkExchange {
  requestId: string;
  url: string;
  status?: number;
  body?: unknown;
}

// ============================================================================
// Session
// ============================================================================

export type SessionState = 'init' | 'driver-ready' | 'running' | 'completed' | 'failed';

export interface RunSummary {
  site: string;
  state: SessionState;
  startedAt: string;
  durationMs: number;
  succeeded: number;
  failed: number;
  rows: number;
  files: string[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface ProxyConfig {
  server: string;
  username?: string;
  password?: string;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'silent';

export interface ScraperConfig {
  logLevel: LogLevel;
  headless: boolean;
  dataDir: string;
  scrapeOpsApiKey?: string;
  readyTimeoutMs: number;
  submitSettleMs: number;
  pageSettleMs: number;
  proxy?: ProxyConfig;
}
