/**
 * Challenge Gate
 *
 * Suspends the pipeline until a human supplies the solution to an
 * anti-automation challenge. The responder is an input channel: the terminal
 * in production, a programmatic responder in tests. The wait is unbounded but
 * cancellable through the run's abort signal.
 */

import { createInterface } from 'node:readline/promises';
import type { Logger } from './utils/logger.ts';
import { createError, isInterrupt } from './types.ts';
import { throwIfInterrupted } from './utils/timing.ts';

export interface ChallengeRequest {
  /** Key whose submission is blocked by the challenge */
  key: string;
  site: string;
  prompt: string;
}

export interface ChallengeResponder {
  solve(request: ChallengeRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Reads the solution from the terminal. The CAPTCHA itself is visible in the
 * (non-headless) browser window.
 *
 * On a terminal, readline takes the keyboard and Ctrl+C never reaches the
 * process as a signal; it is turned into INTERRUPTED here so the run still
 * takes its interrupt path.
 */
export function createConsoleResponder(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): ChallengeResponder {
  return {
    async solve(request, signal) {
      const rl = createInterface({ input, output });
      try {
        return await new Promise<string>((resolve, reject) => {
          rl.once('SIGINT', () => {
            reject(createError('INTERRUPTED', 'Run interrupted by operator at the challenge prompt', { key: request.key }));
          });
          rl.question(`[${request.site}] ${request.prompt} (key ${request.key}): `, { signal }).then(resolve, reject);
        });
      } finally {
        rl.close();
      }
    },
  };
}

export interface ChallengeGateOptions {
  responder: ChallengeResponder;
  logger: Logger;
  site: string;
  prompt?: string;
  signal?: AbortSignal;
}

export class ChallengeGate {
  private readonly responder: ChallengeResponder;
  private readonly log: Logger;
  private readonly site: string;
  private readonly prompt: string;
  private readonly signal?: AbortSignal;

  constructor(options: ChallengeGateOptions) {
    this.responder = options.responder;
    this.log = options.logger;
    this.site = options.site;
    this.prompt = options.prompt ?? 'Enter the CAPTCHA solution';
    this.signal = options.signal;
  }

  /**
   * Block until the responder answers. A wrong answer is not detected here;
   * it surfaces later as that key's extraction failure.
   */
  async resolve(key: string): Promise<string> {
    throwIfInterrupted(this.signal);
    this.log.info(`Waiting for challenge solution for key ${key}...`);

    let solution: string;
    try {
      solution = await this.responder.solve({ key, site: this.site, prompt: this.prompt }, this.signal);
    } catch (err) {
      if (isInterrupt(err)) throw err;
      if (this.signal?.aborted) {
        throw createError('INTERRUPTED', 'Run interrupted while waiting for a challenge solution', { key, cause: err });
      }
      throw createError('CHALLENGE_FAILED', `Challenge responder failed: ${(err as Error).message}`, { key, cause: err });
    }

    const trimmed = solution.trim();
    if (trimmed === '') {
      throw createError('CHALLENGE_FAILED', 'Empty challenge solution', { key });
    }

    this.log.info(`Submitting challenge solution for key ${key}`);
    return trimmed;
  }
}
