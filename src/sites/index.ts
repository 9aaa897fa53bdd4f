import type { SiteDefinition } from '../strategies.ts';
import { createError } from '../types.ts';
import { redjum } from './redjum.ts';
import { reinfo } from './reinfo.ts';
import { sunat } from './sunat.ts';

export const SITES: Readonly<Record<string, SiteDefinition>> = { sunat, redjum, reinfo };

export function siteNames(): string[] {
  return Object.keys(SITES);
}

export function getSite(name: string): SiteDefinition {
  const site = SITES[name];
  if (!site) {
    throw createError('CONFIGURATION_ERROR', `Unknown site "${name}" (available: ${siteNames().join(', ')})`);
  }
  return site;
}

export { redjum, reinfo, sunat };
