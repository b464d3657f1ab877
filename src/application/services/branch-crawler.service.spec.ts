import { FakeClock, FakeFetcher, FakeTransport, directoryPage, testConfigService } from '../../../test/fakes';
import { ProxyPool } from '../../domain/entities/proxy-pool.entity';
import {
  FatalResolutionError,
  InvalidInputError,
  OperationCancelledError,
} from '../../domain/errors/resolution.errors';
import { AntiBlockingHttpClient } from '../../infrastructure/adapters/anti-blocking-http.client';
import { CnpjBizDirectoryAdapter } from '../../infrastructure/adapters/cnpj-biz-directory.adapter';
import { DiretorioBrasilDirectoryAdapter } from '../../infrastructure/adapters/diretorio-brasil-directory.adapter';
import { BranchCrawlerService } from './branch-crawler.service';

describe('BranchCrawlerService', () => {
  const directory = new DiretorioBrasilDirectoryAdapter(testConfigService());
  const seed = 'https://directory.test/filiais/acme-sa-11222333000181.html';

  const pages: Record<string, string> = {
    [seed]: directoryPage(
      [
        ['Matriz', '11.222.333/0001-81'],
        ['Filial', '11.222.333/0002-62'],
        ['Filial', '11.222.333/0001-99'],
      ],
      ['?p=2', '?p=3'],
    ),
    [`${seed}?p=2`]: directoryPage(
      [
        ['Filial', '11.222.333/0003-43'],
        ['Filial SP', '11.222.333/0002-62'],
      ],
      ['?p=2', '?p=3', '#topo'],
    ),
  };

  it('recorre todas las páginas y deduplica por CNPJ', async () => {
    const fetcher = new FakeFetcher(pages);
    const crawler = new BranchCrawlerService(fetcher, directory);

    const result = await crawler.crawl('Acme S.A.', '11.222.333/0001-81');

    expect(result.entries).toEqual([
      { label: 'Filial SP', cnpj: '11.222.333/0002-62' },
      { label: 'Filial', cnpj: '11.222.333/0003-43' },
    ]);
    expect(result.primaryCnpj).toBe('11.222.333/0001-81');
    expect(result.seedUrl).toBe(seed);
    expect(result.pagesVisited).toBe(2);
    expect(result.failedPages).toEqual([`${seed}?p=3`]);
    expect(result.discardedRows).toBe(1);
    expect(result.cancelled).toBe(false);
  });

  it('visita cada página una sola vez', async () => {
    const fetcher = new FakeFetcher(pages);
    await new BranchCrawlerService(fetcher, directory).crawl('Acme S.A.', '11222333000181');

    expect(fetcher.calls).toEqual([seed, `${seed}?p=2`, `${seed}?p=3`]);
  });

  it('nombre inutilizable o CNPJ inválido → InvalidInputError', async () => {
    const crawler = new BranchCrawlerService(new FakeFetcher(pages), directory);

    await expect(crawler.crawl('!!!', '11.222.333/0001-81')).rejects.toThrow(InvalidInputError);
    await expect(crawler.crawl('Acme S.A.', '11.222.333/0001-99')).rejects.toThrow(InvalidInputError);
  });

  it('la cancelación devuelve lo recolectado hasta ese momento', async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher(pages);
    fetcher.onFetch = () => controller.abort();

    const result = await new BranchCrawlerService(fetcher, directory).crawl(
      'Acme S.A.',
      '11.222.333/0001-81',
      controller.signal,
    );

    expect(result.cancelled).toBe(true);
    expect(result.pagesVisited).toBe(1);
    expect(result.entries).toEqual([{ label: 'Filial', cnpj: '11.222.333/0002-62' }]);
    expect(fetcher.calls).toEqual([seed]);
  });

  it('OperationCancelledError del fetcher también marca la cancelación', async () => {
    const fetcher = new FakeFetcher(pages);
    fetcher.onFetch = () => {
      throw new OperationCancelledError();
    };

    const result = await new BranchCrawlerService(fetcher, directory).crawl('Acme S.A.', '11222333000181');

    expect(result.cancelled).toBe(true);
    expect(result.entries).toEqual([]);
  });

  it('un error fatal se propaga', async () => {
    const fetcher = new FakeFetcher(pages);
    fetcher.onFetch = () => {
      throw new FatalResolutionError('proxy mal configurado');
    };

    await expect(
      new BranchCrawlerService(fetcher, directory).crawl('Acme S.A.', '11222333000181'),
    ).rejects.toThrow(FatalResolutionError);
  });

  it('con el cliente anti-bloqueo reintenta la página bloqueada', async () => {
    const transport = new FakeTransport().on(
      seed,
      { status: 429, body: '' },
      { status: 200, body: directoryPage([['Filial', '11.222.333/0002-62']]) },
    );
    const client = new AntiBlockingHttpClient(
      testConfigService(),
      transport,
      new ProxyPool(['http://p1.test:8080', 'http://p2.test:8080']),
      new FakeClock(0),
    );

    const result = await new BranchCrawlerService(client, directory).crawl('Acme S.A.', '11222333000181');

    expect(result.entries).toEqual([{ label: 'Filial', cnpj: '11.222.333/0002-62' }]);
    expect(transport.requests.map((r) => r.proxy?.label)).toEqual(['p1.test:8080', 'p2.test:8080']);
  });

  describe('con cnpj.biz (páginas fijas, sin paginación)', () => {
    const cnpjBiz = new CnpjBizDirectoryAdapter(testConfigService());
    const base = 'https://cnpjbiz.test';
    const table = (rows: Array<[string, string, string]>) =>
      `<html><body><table>${rows
        .map(([name, cnpj, kind]) => `<tr><td>${name}</td><td>${cnpj}</td><td>${kind}</td></tr>`)
        .join('')}</table></body></html>`;

    it('une las filas de todas las páginas y salta la que falla', async () => {
      const fetcher = new FakeFetcher({
        [`${base}/11222333000181`]: table([
          ['ACME SA', '11.222.333/0001-81', 'Matriz'],
          ['ACME SA', '11.222.333/0002-62', 'Filial'],
        ]),
        [`${base}/cnpj/11222333000181/filiais`]: table([
          ['ACME SA', '11.222.333/0002-62', 'Filial SP'],
          ['ACME SA', '11.222.333/0003-43', 'Filial'],
        ]),
      });

      const result = await new BranchCrawlerService(fetcher, cnpjBiz).crawl('Acme S.A.', '11.222.333/0001-81');

      expect(fetcher.calls).toEqual([
        `${base}/11222333000181`,
        `${base}/cnpj/11222333000181/filiais`,
        `${base}/cnpj/11222333000181/empresas-relacionadas`,
      ]);
      expect(result.seedUrl).toBe(`${base}/11222333000181`);
      expect(result.entries).toEqual([
        { label: 'Filial SP', cnpj: '11.222.333/0002-62' },
        { label: 'Filial', cnpj: '11.222.333/0003-43' },
      ]);
      expect(result.pagesVisited).toBe(2);
      expect(result.failedPages).toEqual([`${base}/cnpj/11222333000181/empresas-relacionadas`]);
    });
  });
});
