/**
 * Tests for reading lookup keys
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, test, expect } from 'vitest';
import { parseKeysCsv, readKeysFile } from './keys.ts';

describe('parseKeysCsv', () => {
  test('returns the named column as text, in order', () => {
    const csv = 'name,dni\nAna,00012345\nLuis,45678901\nEva,10000002\n';
    expect(parseKeysCsv(csv, 'dni')).toEqual(['00012345', '45678901', '10000002']);
  });

  test('drops blank cells and trims values', () => {
    const csv = 'ruc\n20100000001\n\n  20100000002 \n,\n';
    expect(parseKeysCsv(csv, 'ruc')).toEqual(['20100000001', '20100000002']);
  });

  test('keeps duplicates', () => {
    expect(parseKeysCsv('ruc\n1\n1\n', 'ruc')).toEqual(['1', '1']);
  });

  test('a missing column is a configuration error', () => {
    expect(() => parseKeysCsv('name\nAna\n', 'dni')).toThrow('Key file has no "dni" column');
  });
});

describe('readKeysFile', () => {
  test('reads keys from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'keys-'));
    try {
      const file = join(dir, 'keys.csv');
      await writeFile(file, 'ruc,nombre\n00100000001,ACME\n');
      await expect(readKeysFile(file, 'ruc')).resolves.toEqual(['00100000001']);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test('an unreadable file is a configuration error', async () => {
    await expect(readKeysFile(join(tmpdir(), 'does-not-exist', 'keys.csv'), 'ruc')).rejects.toMatchObject({
      code: 'CONFIGURATION_ERROR',
    });
  });
});
