import {
  FakeClock,
  FakeFetcher,
  StubLayer,
  StubRegistry,
  directoryPage,
  testConfigService,
} from '../../../test/fakes';
import { layerHit, layerMiss } from '../../domain/entities/layer-outcome.entity';
import { DiscoveryLayer } from '../../domain/enums/discovery-layer.enum';
import { FailureKind, FatalResolutionError } from '../../domain/errors/resolution.errors';
import { DiretorioBrasilDirectoryAdapter } from '../../infrastructure/adapters/diretorio-brasil-directory.adapter';
import { InMemoryResultSink } from '../../infrastructure/adapters/sinks/in-memory-result.sink';
import { BranchCrawlerService } from './branch-crawler.service';
import { CompanyBatchService } from './company-batch.service';
import { LayeredResolverService } from './layered-resolver.service';

const KNOWN: Record<string, string[]> = {
  Acme: ['11.222.333/0001-81'],
  Beta: ['07.689.002/0001-89', '33.300.012/0001-90'],
};

const ACME_SEED = 'https://directory.test/filiais/acme-11222333000181.html';

describe('CompanyBatchService', () => {
  let fetcher: FakeFetcher;

  const website = (respond?: (name: string) => Promise<void>) =>
    new StubLayer(DiscoveryLayer.WEBSITE, async (name) => {
      if (respond) await respond(name);
      const candidates = KNOWN[name];
      return candidates
        ? layerHit(DiscoveryLayer.WEBSITE, candidates, `https://${name.toLowerCase()}.com.br`, 'ok')
        : layerMiss(DiscoveryLayer.WEBSITE, FailureKind.PARSE_MISS, 'sin CNPJ');
    });

  const build = (layer = website()) => {
    const config = testConfigService();
    const resolver = new LayeredResolverService(
      config,
      [layer],
      new StubRegistry({}, false),
      new FakeClock(),
    );
    const crawler = new BranchCrawlerService(fetcher, new DiretorioBrasilDirectoryAdapter(config));
    return new CompanyBatchService(config, resolver, crawler);
  };

  beforeEach(() => {
    fetcher = new FakeFetcher({
      [ACME_SEED]: directoryPage([
        ['Matriz', '11.222.333/0001-81'],
        ['Filial RJ', '11.222.333/0002-62'],
        ['Filial SP', '11.222.333/0003-43'],
      ]),
    });
  });

  it('resume el lote y deja las filiales debajo de su matriz', async () => {
    const sink = new InMemoryResultSink();

    const summary = await build().run(
      ['Acme', 'Beta', 'Gamma'],
      { includeBranches: true, concurrency: 1 },
      sink,
    );

    expect(summary).toEqual({
      total: 3,
      success: 1,
      multiple: 1,
      notFound: 1,
      errors: 0,
      branches: 2,
      cancelled: false,
    });
    expect(sink.getRows().map((row) => [row.company, row.label, row.cnpj, row.status])).toEqual([
      ['Acme', 'Matriz', '11.222.333/0001-81', 'success'],
      ['Acme', 'Filial RJ', '11.222.333/0002-62', 'ok'],
      ['Acme', 'Filial SP', '11.222.333/0003-43', 'ok'],
      ['Beta', 'Matriz', '07.689.002/0001-89', 'multiple'],
      ['Gamma', '', '', 'not_found'],
    ]);
    expect(sink.getRows()[1].sourceUrl).toBe(ACME_SEED);
  });

  it('sin includeBranches no consulta el directorio', async () => {
    const sink = new InMemoryResultSink();

    const summary = await build().run(['Acme'], { includeBranches: false }, sink);

    expect(summary.branches).toBe(0);
    expect(fetcher.calls).toEqual([]);
    expect(sink.getRows()).toHaveLength(1);
  });

  it('un error al enumerar filiales deja una fila de error y el lote sigue', async () => {
    fetcher.onFetch = () => {
      throw new FatalResolutionError('proxy roto');
    };
    const sink = new InMemoryResultSink();

    const summary = await build().run(['Acme', 'Gamma'], { includeBranches: true, concurrency: 1 }, sink);

    expect(summary.success).toBe(1);
    expect(summary.notFound).toBe(1);
    expect(summary.errors).toBe(1);
    expect(sink.getRows().map((row) => [row.company, row.status, row.notes])).toEqual([
      ['Acme', 'success', 'website: ok'],
      ['Acme', 'error', 'filiales: [Fatal] proxy roto'],
      [
        'Gamma',
        'not_found',
        'website: [ParseMiss] sin CNPJ; encyclopedia: omitida (no configurada); ' +
          'search_engine: omitida (no configurada)',
      ],
    ]);
  });

  it('no supera la concurrencia pedida', async () => {
    let active = 0;
    let peak = 0;
    const slow = website(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise<void>((resolve) => setImmediate(resolve));
      active--;
    });

    const summary = await build(slow).run(
      ['A1', 'A2', 'A3', 'A4', 'A5'],
      { includeBranches: false, concurrency: 3 },
      new InMemoryResultSink(),
    );

    expect(summary.notFound).toBe(5);
    expect(peak).toBe(3);
    expect(slow.attempts.sort()).toEqual(['A1', 'A2', 'A3', 'A4', 'A5']);
  });

  it('con la señal ya abortada no procesa nada', async () => {
    const controller = new AbortController();
    controller.abort();
    const layer = website();
    const sink = new InMemoryResultSink();

    const summary = await build(layer).run(['Acme', 'Beta'], { includeBranches: true }, sink, controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(summary.total).toBe(2);
    expect(layer.attempts).toEqual([]);
    expect(sink.getRows()).toEqual([]);
  });

  it('lista vacía → resumen en cero', async () => {
    const summary = await build().run([], { includeBranches: true }, new InMemoryResultSink());

    expect(summary).toEqual({
      total: 0,
      success: 0,
      multiple: 0,
      notFound: 0,
      errors: 0,
      branches: 0,
      cancelled: false,
    });
  });
});
