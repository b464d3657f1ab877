import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FetchStatus } from '../../domain/enums/fetch-status.enum';
import { FetchResult, PageFetchOutcome } from '../../domain/entities/page-fetch-outcome.entity';
import { PROXY_POOL, ProxyEndpoint, ProxyPool } from '../../domain/entities/proxy-pool.entity';
import { RetryPolicy } from '../../domain/entities/retry-policy.entity';
import {
  FatalResolutionError,
  OperationCancelledError,
  throwIfCancelled,
} from '../../domain/errors/resolution.errors';
import { CLOCK, ClockPort } from '../../domain/ports/clock.port';
import { HTTP_TRANSPORT, HttpTransportPort } from '../../domain/ports/http-transport.port';
import { PageFetcherPort } from '../../domain/ports/page-fetcher.port';

/**
 * Cliente HTTP anti-bloqueo.
 *
 * Por cada intento: espera aleatoria → siguiente proxy del pool → headers de navegador
 * aleatorizados (UA, Accept-Language, Referer de Google) → clasificación de la respuesta.
 * Devuelve el primer OK; si se agotan los intentos devuelve `FetchExhausted` con el detalle.
 */
@Injectable()
export class AntiBlockingHttpClient implements PageFetcherPort {
  private readonly logger = new Logger(AntiBlockingHttpClient.name);
  private readonly userAgents: string[];
  private readonly acceptLanguages: string[];

  constructor(
    private readonly config: ConfigService,
    @Inject(HTTP_TRANSPORT) private readonly transport: HttpTransportPort,
    @Inject(PROXY_POOL) private readonly pool: ProxyPool,
    @Inject(CLOCK) private readonly clock: ClockPort,
  ) {
    this.userAgents = this.config.getOrThrow<string[]>('scraper.userAgents');
    this.acceptLanguages = this.config.getOrThrow<string[]>('scraper.acceptLanguages');
  }

  async fetch(url: string, policy: RetryPolicy, signal?: AbortSignal): Promise<FetchResult> {
    const outcomes: PageFetchOutcome[] = [];

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      throwIfCancelled(signal);
      await this.clock.sleep(this.jitter(policy));
      throwIfCancelled(signal);

      const proxy = this.pool.next();
      const via = proxy ? proxy.label : null;
      const outcome = await this.attemptOnce(url, policy, attempt, proxy);
      outcomes.push(outcome);

      if (outcome.status === FetchStatus.OK && outcome.body !== null) {
        this.logger.log(`[AntiBlock] ✅ ${url} (intento ${attempt}, ${outcome.reason}${via ? ` via ${via}` : ''})`);
        return { ok: true, body: outcome.body, attempts: attempt, outcome };
      }

      this.logger.warn(
        `[AntiBlock] Intento ${attempt}/${policy.maxAttempts} ${outcome.status}: ${outcome.reason}${via ? ` via ${via}` : ''}, rotando...`,
      );
    }

    this.logger.error(`[AntiBlock] ❌ ${url}: ${policy.maxAttempts} intentos agotados`);
    return { ok: false, reason: 'FetchExhausted', attempts: outcomes.length, outcomes };
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private async attemptOnce(
    url: string,
    policy: RetryPolicy,
    attempt: number,
    proxy: ProxyEndpoint | null,
  ): Promise<PageFetchOutcome> {
    const via = proxy ? proxy.label : null;

    try {
      const response = await this.transport.get({
        url,
        headers: this.buildHeaders(url),
        timeoutMs: policy.timeoutMs,
        proxy,
      });
      const verdict = policy.classify(response.status, response.body);

      return {
        attempt,
        status: verdict.status,
        httpStatus: response.status,
        reason: verdict.reason,
        proxy: via,
        body: verdict.status === FetchStatus.OK ? response.body : null,
      };
    } catch (error) {
      if (error instanceof FatalResolutionError || error instanceof OperationCancelledError) {
        throw error;
      }
      return {
        attempt,
        status: FetchStatus.TRANSIENT_ERROR,
        httpStatus: 0,
        reason: error instanceof Error ? error.message : String(error),
        proxy: via,
        body: null,
      };
    }
  }

  /** Espera uniforme en [min, max] */
  private jitter(policy: RetryPolicy): number {
    const { minMs, maxMs } = policy.delay;
    return minMs + this.clock.random() * (maxMs - minMs);
  }

  private pick(values: string[]): string {
    return values[Math.floor(this.clock.random() * values.length)];
  }

  private buildHeaders(url: string): Record<string, string> {
    return {
      'User-Agent': this.pick(this.userAgents),
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': this.pick(this.acceptLanguages),
      'Accept-Encoding': 'gzip, deflate, br',
      Referer: AntiBlockingHttpClient.googleReferer(url),
      DNT: '1',
      Connection: 'keep-alive',
      'Upgrade-Insecure-Requests': '1',
    };
  }

  /** Simula haber llegado desde una búsqueda en Google del último segmento de la URL */
  static googleReferer(url: string): string {
    let term: string;
    try {
      const parsed = new URL(url);
      const segment = parsed.pathname.split('/').filter(Boolean).pop();
      term = segment ? segment.replace(/\.html?$/i, '') : parsed.hostname;
    } catch {
      term = url;
    }
    return `https://www.google.com/search?q=${encodeURIComponent(term)}`;
  }
}
