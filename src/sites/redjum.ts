/**
 * REDJUM judicial debtor registry: lookup by DNI behind a CAPTCHA.
 * The result is only rendered from a background JSON response, so the
 * record is read off the wire instead of the page.
 */

import type { NetworkLookupSite } from '../strategies.ts';

export const redjum: NetworkLookupSite = {
  name: 'redjum',
  description: 'REDJUM judicial debtor registry (DNI lookup)',
  strategy: 'network-lookup',
  keyColumn: 'dni',
  form: {
    url: 'https://redjum.pj.gob.pe/redjum/#/',
    // Angular app; controls render after the shell loads
    loadDelayMs: 1000,
    readySelector: 'a.nav-link.ng-binding',
    steps: [
      { action: 'click', selector: 'a.nav-link.ng-binding', nth: 2, description: 'Opened search by document tab' },
      { action: 'wait', ms: 1000 },
      { action: 'select', selector: 'select.form-control', label: 'DNI', description: 'Selected DNI document type' },
    ],
    keyInput: '#numerodocumento',
    challengeInput: '#captcha',
    submit: 'button.btn.btn-red',
  },
  capture: ['*deudoresPorDocumento*'],
  challengePrompt: 'Enter the CAPTCHA solution',
};
