import { ConfigService } from '@nestjs/config';
import {
  BranchDirectorySource,
  ClockPort,
  CompanyRegistryPort,
  DEFAULT_LAYER_PRIORITY,
  DiscoveryLayer,
  DiscoveryLayerPort,
  FetchResult,
  FetchStatus,
  HttpRequest,
  HttpResponse,
  HttpTransportPort,
  LayerOutcome,
  PageFetcherPort,
  RegistryRecord,
  RetryPolicy,
  TransportError,
} from '../src/domain';
import { ScraperConfig } from '../src/shared/config/scraper.config';

/** Reloj sin esperas reales: registra cada sleep y devuelve un azar fijo */
export class FakeClock implements ClockPort {
  readonly sleeps: number[] = [];
  private elapsed = 0;

  constructor(private readonly randomValue = 0) {}

  now(): number {
    return this.elapsed;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.elapsed += ms;
  }

  random(): number {
    return this.randomValue;
  }
}

export type FakeReply = { status: number; body: string; url?: string } | Error;

/**
 * Transporte en memoria. Cada URL tiene una cola de respuestas;
 * la última se repite. Una URL sin ruta falla como error de red.
 */
export class FakeTransport implements HttpTransportPort {
  readonly requests: HttpRequest[] = [];
  private readonly routes = new Map<string, FakeReply[]>();

  on(url: string, ...replies: FakeReply[]): this {
    this.routes.set(url, replies);
    return this;
  }

  urls(): string[] {
    return this.requests.map((r) => r.url);
  }

  async get(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const queue = this.routes.get(request.url);
    if (!queue || queue.length === 0) {
      throw new TransportError(`sin ruta para ${request.url}`, 'NETWORK');
    }

    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new TransportError(`sin ruta para ${request.url}`, 'NETWORK');
    }
    if (reply instanceof Error) throw reply;
    return { status: reply.status, body: reply.body, url: reply.url ?? request.url };
  }
}

/** Config de pruebas: sin esperas y sin claves externas */
export function testScraperConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return {
    port: 3458,
    apiKey: 'test-secret',
    proxies: [],
    http: {
      maxAttempts: 3,
      delay: { minMs: 100, maxMs: 200 },
      timeoutMs: 1000,
      minBodyLength: 50,
      rotateStatuses: [403, 422, 423, 429, 500, 501, 502, 503, 504],
      blockIndicators: ['você foi bloqueado', 'captcha', 'just a moment'],
    },
    directory: {
      source: BranchDirectorySource.DIRETORIO_BRASIL,
      baseUrl: 'https://directory.test',
      expectedMarkers: ['<div class="row-list">', 'empresas'],
    },
    cnpjBiz: {
      baseUrl: 'https://cnpjbiz.test',
      expectedMarkers: ['<table', 'cnpj'],
    },
    website: { timeoutMs: 1000, maxRedirects: 5, politeDelayMs: 10 },
    encyclopedia: {
      apiUrl: 'https://wiki.test/w/api.php',
      articleBaseUrl: 'https://wiki.test/wiki/',
      timeoutMs: 1000,
      politeDelayMs: 10,
    },
    searchEngine: {
      apiKey: '',
      endpoint: 'https://serp.test/search.json',
      timeoutMs: 1000,
      maxOrganicResults: 5,
    },
    registry: {
      enabled: true,
      apiToken: '',
      endpoints: ['https://registry-a.test/cnpj/{cnpj}', 'https://registry-b.test/{cnpj}'],
      timeoutMs: 1000,
      politeDelayMs: 10,
    },
    resolver: { layerPriority: [...DEFAULT_LAYER_PRIORITY], layerDelayMs: 1000 },
    batch: { maxConcurrency: 2, companyBudgetMs: 0 },
    userAgents: ['ua-one', 'ua-two'],
    acceptLanguages: ['pt-BR,pt;q=0.9', 'pt-BR'],
    ...overrides,
  };
}

export function testConfigService(overrides: Partial<ScraperConfig> = {}): ConfigService {
  return new ConfigService({ scraper: testScraperConfig(overrides) });
}

/** Página del directorio de filiales con el marcado del sitio */
export function directoryPage(rows: Array<[label: string, cnpj: string]>, pageHrefs: string[] = []): string {
  const items = rows
    .map(
      ([label, cnpj]) =>
        `<div class="row-list"><h5 class="socio">${label}</h5><p class="det">CNPJ: ${cnpj}</p></div>`,
    )
    .join('\n');
  const links = pageHrefs.map((href) => `<li><a href="${href}">pág</a></li>`).join('');

  return `<html><body><h1>Filiais de empresas</h1>
${items}
<nav aria-label="Resultado da busca"><ul>${links}</ul></nav>
</body></html>`;
}

/** Capa de descubrimiento con respuesta programada por nombre de empresa */
export class StubLayer implements DiscoveryLayerPort {
  readonly attempts: string[] = [];

  constructor(
    readonly layer: DiscoveryLayer,
    private readonly respond: (companyName: string) => Promise<LayerOutcome>,
    private readonly enabled = true,
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  attempt(companyName: string): Promise<LayerOutcome> {
    this.attempts.push(companyName);
    return this.respond(companyName);
  }
}

/** Registro con fichas fijas por CNPJ formateado */
export class StubRegistry implements CompanyRegistryPort {
  readonly lookups: string[] = [];
  onLookup: (cnpj: string) => void = () => undefined;

  constructor(
    private readonly records: Record<string, RegistryRecord>,
    private readonly enabled = true,
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  async lookup(cnpj: string): Promise<RegistryRecord | null> {
    this.lookups.push(cnpj);
    this.onLookup(cnpj);
    return this.records[cnpj] ?? null;
  }
}

/** Fetcher en memoria: una URL sin página configurada agota sus intentos */
export class FakeFetcher implements PageFetcherPort {
  readonly calls: string[] = [];
  onFetch: (url: string) => void = () => undefined;

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string, _policy: RetryPolicy): Promise<FetchResult> {
    this.calls.push(url);
    this.onFetch(url);

    const body = this.pages[url];
    if (body === undefined) {
      return { ok: false, reason: 'FetchExhausted', attempts: 3, outcomes: [] };
    }
    return {
      ok: true,
      body,
      attempts: 1,
      outcome: { attempt: 1, status: FetchStatus.OK, httpStatus: 200, reason: 'ok', proxy: null, body },
    };
  }
}
