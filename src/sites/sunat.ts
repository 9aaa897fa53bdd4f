/**
 * SUNAT taxpayer registry: lookup by RUC, fields read from the result panel
 */

import type { DomLookupSite } from '../strategies.ts';
import type { FieldSpec } from '../fields.ts';

const PANEL = 'body > div > div.row > div > div.panel.panel-primary > div.list-group';

/** nth row of the result panel, then the path inside it */
const row = (n: number, path: string) => `${PANEL} > div:nth-child(${n}) > div > ${path}`;

const VALUE = 'div.col-sm-7 > p';

// Optional sections shift later rows, hence the fallbacks
const fields: FieldSpec[] = [
  { name: 'ruc_nombre', selectors: [row(1, 'div.col-sm-7')] },
  { name: 'tipo_contribuyente', selectors: [row(2, VALUE)] },
  { name: 'tipo_documento', selectors: [row(3, VALUE)] },
  { name: 'nombre_comercial', selectors: [row(4, VALUE), row(3, VALUE)] },
  { name: 'fecha_inscripcion', selectors: [row(5, 'div:nth-child(2) > p')] },
  { name: 'fecha_inicio_actividades', selectors: [row(5, 'div:nth-child(4) > p'), row(4, 'div:nth-child(4) > p')] },
  { name: 'estado', selectors: [row(6, VALUE)] },
  { name: 'domicilio', selectors: [row(8, VALUE), row(7, VALUE)] },
  { name: 'sistema_emision', selectors: [row(9, 'div:nth-child(2) > p')] },
  {
    name: 'actividad_comercio_exterior',
    selectors: [row(9, 'div:nth-child(4) > p'), row(8, 'div:nth-child(4) > p')],
  },
  { name: 'sistema_contabilidad', selectors: [row(10, VALUE), row(9, 'div:nth-child(2) > p')] },
  {
    name: 'actividades_economicas',
    selectors: [
      row(11, 'div.col-sm-7 > table > tbody > tr > td'),
      row(10, 'div.col-sm-7 > table > tbody > tr:nth-child(1) > td'),
    ],
    distinctFrom: 'sistema_contabilidad',
    preferLongest: true,
  },
  { name: 'emisor_electronico_desde', selectors: [row(14, VALUE)] },
  { name: 'comprobantes_electronicos', selectors: [row(15, VALUE)] },
];

export const sunat: DomLookupSite = {
  name: 'sunat',
  description: 'SUNAT taxpayer registry (RUC lookup)',
  strategy: 'dom-lookup',
  keyColumn: 'ruc',
  form: {
    url: 'https://e-consultaruc.sunat.gob.pe',
    readySelector: '#txtRuc',
    keyInput: '#txtRuc',
    submit: '#btnAceptar',
  },
  resultContainer: 'div.list-group',
  fields,
};
