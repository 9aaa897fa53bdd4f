/**
 * Unit tests for the challenge gate
 */

import { PassThrough } from 'node:stream';
import { describe, test, expect, vi } from 'vitest';
import { ChallengeGate, createConsoleResponder, type ChallengeResponder } from './challenge.ts';
import { createMemoryLogger } from '../tests/support/fake-driver.ts';

function gateWith(responder: ChallengeResponder, signal?: AbortSignal) {
  const { logger } = createMemoryLogger();
  return new ChallengeGate({ responder, logger, site: 'test', signal });
}

describe('ChallengeGate', () => {
  test('returns the trimmed solution and passes the key to the responder', async () => {
    const solve = vi.fn(async () => '  x7kq2 \n');
    const gate = gateWith({ solve });

    await expect(gate.resolve('12345678')).resolves.toBe('x7kq2');
    expect(solve).toHaveBeenCalledWith(
      { key: '12345678', site: 'test', prompt: 'Enter the CAPTCHA solution' },
      undefined
    );
  });

  test('a responder failure is CHALLENGE_FAILED for that key', async () => {
    const gate = gateWith({
      solve: async () => {
        throw new Error('input closed');
      },
    });

    await expect(gate.resolve('B')).rejects.toMatchObject({
      code: 'CHALLENGE_FAILED',
      key: 'B',
      message: 'Challenge responder failed: input closed',
    });
  });

  test('an empty solution is CHALLENGE_FAILED', async () => {
    const gate = gateWith({ solve: async () => '   ' });
    await expect(gate.resolve('A')).rejects.toMatchObject({ code: 'CHALLENGE_FAILED' });
  });

  test('aborting while waiting is INTERRUPTED', async () => {
    const controller = new AbortController();
    const gate = gateWith(
      {
        solve: (_request, signal) =>
          new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
          }),
      },
      controller.signal
    );

    const pending = gate.resolve('A');
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'INTERRUPTED', key: 'A' });
  });

  test('does not prompt once the run is interrupted', async () => {
    const controller = new AbortController();
    controller.abort();
    const solve = vi.fn(async () => 'abc');
    const gate = gateWith({ solve }, controller.signal);

    await expect(gate.resolve('A')).rejects.toMatchObject({ code: 'INTERRUPTED' });
    expect(solve).not.toHaveBeenCalled();
  });
});

describe('createConsoleResponder', () => {
  test('reads one line from the input stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const responder = createConsoleResponder(input, output);

    const answer = responder.solve({ key: '123', site: 'test', prompt: 'Solve it' });
    input.write('abcd\n');

    await expect(answer).resolves.toBe('abcd');
  });

  test('Ctrl+C at a terminal prompt interrupts the run instead of failing the key', async () => {
    const input = Object.assign(new PassThrough(), { isTTY: true });
    const output = Object.assign(new PassThrough(), { isTTY: true });
    const gate = gateWith(createConsoleResponder(input, output), new AbortController().signal);

    const pending = gate.resolve('12345678');
    input.write('\x03');

    await expect(pending).rejects.toMatchObject({
      code: 'INTERRUPTED',
      key: '12345678',
      message: 'Run interrupted by operator at the challenge prompt',
    });
  });
});
