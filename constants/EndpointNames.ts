// Filename: constants/EndpointNames.ts

/**
 * --- ENDPOINTS ---
 * Statistics categories served by the proxy. Each maps to one page of the upstream site.
 */
export const ALL_ENDPOINT_NAMES = [
  "producao", // Production
  "processamento", // Grape processing
  "comercializacao", // Domestic trade
  "importacao", // Imports
  "exportacao", // Exports
] as const;

export type EndpointName = (typeof ALL_ENDPOINT_NAMES)[number];

export function isEndpointName(value: string): value is EndpointName {
  return ALL_ENDPOINT_NAMES.some((name) => name === value);
}

/** Upstream `opcao` query value per endpoint. */
export const ROUTE_OPTION_MAP: Readonly<Record<EndpointName, string>> = Object.freeze({
  producao: "opt_02",
  processamento: "opt_03",
  comercializacao: "opt_04",
  importacao: "opt_05",
  exportacao: "opt_06",
});

/** Closed sub-option lists accepted by each endpoint. */
export const VALID_SUB_OPTIONS: Readonly<Record<EndpointName, readonly string[]>> = Object.freeze({
  producao: ["VINHO DE MESA", "VINHO FINO DE MESA (VINIFERA)", "SUCO DE UVA", "DERIVADOS"],
  processamento: ["viniferas", "americanas", "mesa", "semclass"],
  comercializacao: ["VINHO DE MESA", "ESPUMANTES", "UVAS FRESCAS", "SUCO DE UVA"],
  importacao: ["vinhos", "espumantes", "frescas", "passas", "suco"],
  exportacao: ["vinho", "uva", "espumantes", "suco"],
});

export const MIN_YEAR = 1970;
export const MAX_YEAR = 2024;

/** Request parameters that participate in cache keys, per endpoint. */
export const KEY_PARAM_ALLOW_LIST: Readonly<Record<EndpointName, readonly string[]>> = Object.freeze({
  producao: ["year", "sub_option"],
  processamento: ["year", "sub_option"],
  comercializacao: ["year", "sub_option"],
  importacao: ["year", "sub_option"],
  exportacao: ["year", "sub_option"],
});

/**
 * Runs `fn` for every endpoint concurrently and collects the results by endpoint.
 */
export async function mapEndpoints<T>(fn: (endpoint: EndpointName) => Promise<T>): Promise<Record<EndpointName, T>> {
  const [producao, processamento, comercializacao, importacao, exportacao] = await Promise.all([
    fn("producao"),
    fn("processamento"),
    fn("comercializacao"),
    fn("importacao"),
    fn("exportacao"),
  ]);
  return { producao, processamento, comercializacao, importacao, exportacao };
}
