// Filename: config/configEndpointSources.ts

import type { EndpointName } from '../constants/EndpointNames.js';

/**
 * Static source files for one endpoint: a default file plus per-sub-option files.
 */
export interface EndpointSourceMapping {
  default: string;
  subOptions: Readonly<Record<string, string>>;
}

export type EndpointMapping = Readonly<Record<EndpointName, EndpointSourceMapping>>;

/**
 * File names under the static fallback directory.
 * Frozen at load time; validated against the directory by the fallback store.
 */
export const ENDPOINT_SOURCE_MAP: EndpointMapping = Object.freeze({
  producao: Object.freeze({
    default: 'Producao.csv',
    subOptions: Object.freeze({
      'VINHO DE MESA': 'Producao.csv',
      'VINHO FINO DE MESA (VINIFERA)': 'Producao.csv',
      'SUCO DE UVA': 'Producao.csv',
      'DERIVADOS': 'Producao.csv',
    }),
  }),
  processamento: Object.freeze({
    default: 'ProcessaViniferas.csv',
    subOptions: Object.freeze({
      viniferas: 'ProcessaViniferas.csv',
      americanas: 'ProcessaAmericanas.csv',
      mesa: 'ProcessaMesa.csv',
      semclass: 'ProcessaSemclass.csv',
    }),
  }),
  comercializacao: Object.freeze({
    default: 'Comercio.csv',
    subOptions: Object.freeze({
      'VINHO DE MESA': 'Comercio.csv',
      'ESPUMANTES': 'Comercio.csv',
      'UVAS FRESCAS': 'Comercio.csv',
      'SUCO DE UVA': 'Comercio.csv',
    }),
  }),
  importacao: Object.freeze({
    default: 'ImpVinhos.csv',
    subOptions: Object.freeze({
      vinhos: 'ImpVinhos.csv',
      espumantes: 'ImpEspumantes.csv',
      frescas: 'ImpFrescas.csv',
      passas: 'ImpPassas.csv',
      suco: 'ImpSuco.csv',
    }),
  }),
  exportacao: Object.freeze({
    default: 'ExpVinho.csv',
    subOptions: Object.freeze({
      vinho: 'ExpVinho.csv',
      uva: 'ExpUva.csv',
      espumantes: 'ExpEspumantes.csv',
      suco: 'ExpSuco.csv',
    }),
  }),
});
