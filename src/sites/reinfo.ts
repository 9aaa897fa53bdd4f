/**
 * REINFO mining formalisation registry: full dump of the public listing
 */

import type { RegistrySite } from '../strategies.ts';

const FILTER_SETTLE_MS = 1000;

export const reinfo: RegistrySite = {
  name: 'reinfo',
  description: 'REINFO mining formalisation registry (full listing)',
  strategy: 'registry',
  form: {
    url: 'https://pad.minem.gob.pe/REINFO_WEB/Index.aspx',
    readySelector: '#ddllistado',
    // Each selection posts back; give the page a moment before the next one
    steps: [
      { action: 'select', selector: '#ddllistado', label: 'TODOS', description: 'Listado filter [TODOS] set' },
      { action: 'wait', ms: FILTER_SETTLE_MS },
      { action: 'select', selector: '#ddltipopersona', label: 'TODOS', description: 'Tipo persona filter [TODOS] set' },
      { action: 'wait', ms: FILTER_SETTLE_MS },
      { action: 'select', selector: '#ddlordenado', label: 'RUC', description: 'Ordenado filter [RUC] set' },
      { action: 'wait', ms: FILTER_SETTLE_MS },
      { action: 'select', selector: '#ddlforma', label: 'ASC', description: 'Forma filter [ASC] set' },
      { action: 'wait', ms: FILTER_SETTLE_MS },
    ],
    submit: '#btnBuscar',
  },
  resultsReady: '#lblhasta',
  grid: {
    table: 'table.gvRow',
    cell: 'td',
    rowOffset: 3,
    cellOffset: 1,
    next: '#ImgBtnSiguiente',
    totalPages: '#lblhasta',
  },
  columns: [
    'id',
    'ruc',
    'nombre',
    'nombre_derecho_minero',
    'codigo_unico',
    'departamento',
    'provincia',
    'distrito',
    'estado',
  ],
};
