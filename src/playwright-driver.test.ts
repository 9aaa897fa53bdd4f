/**
 * Tests for the Chromium launch settings (no browser is started)
 */

import { describe, test, expect } from 'vitest';
import { launchOptions } from './playwright-driver.ts';

describe('launchOptions', () => {
  test('leaves SIGINT and SIGTERM to the session', () => {
    const options = launchOptions({ headless: true });
    expect(options.handleSIGINT).toBe(false);
    expect(options.handleSIGTERM).toBe(false);
  });

  test('passes proxy credentials through', () => {
    const options = launchOptions({
      headless: false,
      proxy: { server: 'http://proxy.example.test:8080', username: 'scraper', password: 'test-secret' },
    });
    expect(options.proxy).toEqual({
      server: 'http://proxy.example.test:8080',
      username: 'scraper',
      password: 'test-secret',
    });
    expect(options.args).toContain('--start-maximized');
  });

  test('headless runs stay windowless and unproxied by default', () => {
    const options = launchOptions({ headless: true });
    expect(options.proxy).toBeUndefined();
    expect(options.args).not.toContain('--start-maximized');
  });
});
