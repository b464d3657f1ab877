import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cheerio from 'cheerio';
import { LayerOutcome, layerHit, layerMiss } from '../../../domain/entities/layer-outcome.entity';
import { DiscoveryLayer } from '../../../domain/enums/discovery-layer.enum';
import {
  FailureKind,
  SourceUnavailableError,
  throwIfCancelled,
} from '../../../domain/errors/resolution.errors';
import { CLOCK, ClockPort } from '../../../domain/ports/clock.port';
import { DiscoveryLayerPort } from '../../../domain/ports/discovery-layer.port';
import { HTTP_TRANSPORT, HttpTransportPort } from '../../../domain/ports/http-transport.port';
import { ScraperConfig } from '../../../shared/config/scraper.config';
import { findValidCnpjs } from '../../../shared/utils/cnpj';
import { asArray, asRecord, asString, parseJson } from '../../../shared/utils/json';

/**
 * Capa 2: Wikipedia en portugués.
 *
 * 1. action=query&list=search → título del artículo más relevante
 * 2. action=parse&prop=text → HTML del artículo
 * 3. Filas de la infobox cuyo encabezado menciona "CNPJ"; si no hay, toda la infobox
 */
@Injectable()
export class EncyclopediaDiscoveryAdapter implements DiscoveryLayerPort {
  readonly layer = DiscoveryLayer.ENCYCLOPEDIA;
  private readonly logger = new Logger(EncyclopediaDiscoveryAdapter.name);
  private readonly settings: ScraperConfig['encyclopedia'];
  private readonly userAgent: string;

  constructor(
    private readonly config: ConfigService,
    @Inject(HTTP_TRANSPORT) private readonly transport: HttpTransportPort,
    @Inject(CLOCK) private readonly clock: ClockPort,
  ) {
    this.settings = this.config.getOrThrow<ScraperConfig['encyclopedia']>('scraper.encyclopedia');
    this.userAgent = this.config.getOrThrow<string[]>('scraper.userAgents')[0];
  }

  isEnabled(): boolean {
    return true;
  }

  async attempt(companyName: string, signal?: AbortSignal): Promise<LayerOutcome> {
    throwIfCancelled(signal);

    const search = await this.callApi({
      action: 'query',
      list: 'search',
      srsearch: companyName,
      srlimit: '1',
    });
    if (search === null) {
      return layerMiss(this.layer, FailureKind.SOURCE_UNAVAILABLE, 'API de búsqueda sin respuesta');
    }

    const [firstHit] = asArray(asRecord(asRecord(search)?.query)?.search);
    const title = asString(asRecord(firstHit)?.title);
    if (!title) {
      return layerMiss(this.layer, FailureKind.PARSE_MISS, 'sin artículos para el nombre');
    }

    const articleUrl = this.articleUrl(title);
    this.logger.debug(`[Wiki] Artículo: "${title}"`);

    throwIfCancelled(signal);
    await this.clock.sleep(this.settings.politeDelayMs);

    const parsed = await this.callApi({ action: 'parse', page: title, prop: 'text' });
    const html = asString(asRecord(asRecord(parsed)?.parse)?.text);
    if (html === null) {
      return layerMiss(
        this.layer,
        FailureKind.SOURCE_UNAVAILABLE,
        `no se pudo leer el artículo "${title}"`,
        articleUrl,
      );
    }

    const cnpjs = this.extractFromInfobox(html);
    if (cnpjs === null) {
      return layerMiss(this.layer, FailureKind.PARSE_MISS, `"${title}" sin infobox`, articleUrl);
    }
    if (cnpjs.length === 0) {
      return layerMiss(this.layer, FailureKind.PARSE_MISS, `infobox de "${title}" sin CNPJ válido`, articleUrl);
    }

    this.logger.log(`[Wiki] ✅ ${cnpjs.join(', ')} en "${title}"`);
    return layerHit(this.layer, cnpjs, articleUrl, `CNPJ encontrado en ${articleUrl}`);
  }

  /** null si el artículo no tiene infobox */
  extractFromInfobox(html: string): string[] | null {
    const $ = cheerio.load(html);
    const infobox = $('table.infobox').first();
    if (infobox.length === 0) return null;

    const fromRows: string[] = [];
    infobox.find('tr').each((_, el) => {
      const row = $(el);
      if (!row.find('th').text().toLowerCase().includes('cnpj')) return;
      fromRows.push(...findValidCnpjs(row.find('td').text()));
    });
    if (fromRows.length > 0) return [...new Set(fromRows)];

    return findValidCnpjs(infobox.text());
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private articleUrl(title: string): string {
    return this.settings.articleBaseUrl + encodeURIComponent(title.replace(/ /g, '_'));
  }

  /** GET a la API (formato JSON v2). null si no respondió 200 con JSON. */
  private async callApi(params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams({ ...params, format: 'json', formatversion: '2' });
    const url = `${this.settings.apiUrl}?${query.toString()}`;

    try {
      const response = await this.transport.get({
        url,
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        timeoutMs: this.settings.timeoutMs,
      });
      if (response.status !== 200) {
        this.logger.warn(`[Wiki] HTTP ${response.status} en ${params.action}`);
        return null;
      }
      return parseJson(response.body);
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      this.logger.warn(`[Wiki] ${params.action} falló: ${error.message}`);
      return null;
    }
  }
}
