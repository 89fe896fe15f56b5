// Filename: test/scraper/liveFetcher.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLiveFetcher } from '../../features/scraper/liveFetcher.js';
import { charsetFromContentType } from '../../utils/httpClient.js';

vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const BASE = 'http://stats.example.test/index.php';
const PAGE = `<table class="tb_base tb_dados">
  <thead><tr><th>Produto</th><th>Quantidade (L.)</th></tr></thead>
  <tbody><tr><td class="tb_item">Tinto</td><td class="tb_item">10</td></tr></tbody>
  <tfoot><tr><td>Total</td><td>10</td></tr></tfoot>
</table>`;

describe('createLiveFetcher', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const factory = createLiveFetcher({ baseUrl: BASE });

  beforeEach(() => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should fetch the endpoint page and parse its table', async () => {
    fetchMock.mockResolvedValue(new Response(PAGE, { status: 200, headers: { 'content-type': 'text/html' } }));

    const result = await factory('producao', { year: 2023 })(new AbortController().signal);

    expect(result).toEqual({
      ok: true,
      record: {
        header: [['Produto', 'Quantidade (L.)']],
        body: [{ item_data: ['Tinto', '10'], sub_items: [] }],
        footer: [['Total', '10']],
      },
    });
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}?opcao=opt_02&ano=2023`);
  });

  it('should decode the charset the page declares', async () => {
    const bytes = new Uint8Array(
      Buffer.from('<table class="tb_base tb_dados"><tbody><tr><td>Média</td></tr></tbody></table>', 'latin1')
    );
    fetchMock.mockResolvedValue(
      new Response(bytes, { status: 200, headers: { 'content-type': 'text/html; charset=ISO-8859-1' } })
    );

    const result = await factory('processamento', {})(new AbortController().signal);

    expect(result.ok && result.record.body).toEqual([{ item_data: [], sub_items: [['Média']] }]);
  });

  it('should map an error status to an http failure', async () => {
    fetchMock.mockResolvedValue(new Response('down', { status: 503, statusText: 'Service Unavailable' }));

    const result = await factory('producao', {})(new AbortController().signal);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'http',
        message: 'Source site responded with status 503: Service Unavailable',
        status: 503,
      },
    });
  });

  it('should map a rejected request to a network failure', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const result = await factory('producao', {})(new AbortController().signal);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'network', message: 'Failed to fetch from Source site: fetch failed' },
    });
  });

  it('should report an aborted request as aborted', async () => {
    const controller = new AbortController();
    fetchMock.mockImplementation(async () => {
      controller.abort();
      throw new Error('This operation was aborted');
    });

    const result = await factory('producao', {})(controller.signal);

    expect(result).toEqual({ ok: false, error: { kind: 'aborted', message: 'fetch aborted' } });
  });

  it('should report a page without the statistics table as a parse failure', async () => {
    fetchMock.mockResolvedValue(new Response('<p>Em manutenção</p>', { status: 200 }));

    const result = await factory('exportacao', { sub_option: 'vinho' })(new AbortController().signal);

    expect(result).toEqual({ ok: false, error: { kind: 'parse', message: 'statistics table not found in page' } });
  });
});

describe('charsetFromContentType', () => {
  it('should read the declared charset', () => {
    expect(charsetFromContentType('text/html; charset="Windows-1252"')).toBe('windows-1252');
  });

  it('should default to utf-8', () => {
    expect(charsetFromContentType('text/html')).toBe('utf-8');
    expect(charsetFromContentType(null)).toBe('utf-8');
  });
});
