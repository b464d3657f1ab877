import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LayerOutcome, layerHit, layerMiss } from '../../../domain/entities/layer-outcome.entity';
import { DiscoveryLayer } from '../../../domain/enums/discovery-layer.enum';
import {
  FailureKind,
  SourceUnavailableError,
  throwIfCancelled,
} from '../../../domain/errors/resolution.errors';
import { DiscoveryLayerPort } from '../../../domain/ports/discovery-layer.port';
import { HTTP_TRANSPORT, HttpTransportPort } from '../../../domain/ports/http-transport.port';
import { ScraperConfig } from '../../../shared/config/scraper.config';
import { findValidCnpjs } from '../../../shared/utils/cnpj';
import { JsonRecord, asArray, asRecord, asString, parseJson } from '../../../shared/utils/json';

/**
 * Capa 3: Google vía SerpAPI.
 *
 * Orden de lectura de la respuesta:
 * knowledge_graph.legal_identifier → answer_box → primeros organic_results (título + snippet)
 */
@Injectable()
export class SearchEngineDiscoveryAdapter implements DiscoveryLayerPort {
  readonly layer = DiscoveryLayer.SEARCH_ENGINE;
  private readonly logger = new Logger(SearchEngineDiscoveryAdapter.name);
  private readonly settings: ScraperConfig['searchEngine'];

  constructor(
    private readonly config: ConfigService,
    @Inject(HTTP_TRANSPORT) private readonly transport: HttpTransportPort,
  ) {
    this.settings = this.config.getOrThrow<ScraperConfig['searchEngine']>('scraper.searchEngine');
  }

  /** Sin API key la capa se salta */
  isEnabled(): boolean {
    return this.settings.apiKey.length > 0;
  }

  async attempt(companyName: string, signal?: AbortSignal): Promise<LayerOutcome> {
    throwIfCancelled(signal);

    const query = `"${companyName}" CNPJ`;
    const params = new URLSearchParams({
      engine: 'google',
      q: query,
      hl: 'pt-BR',
      gl: 'br',
      api_key: this.settings.apiKey,
    });
    const searchUrl = `https://www.google.com/search?q=${encodeURIComponent(query)}`;

    let payload: JsonRecord | null;
    try {
      const response = await this.transport.get({
        url: `${this.settings.endpoint}?${params.toString()}`,
        headers: { Accept: 'application/json' },
        timeoutMs: this.settings.timeoutMs,
      });
      if (response.status !== 200) {
        return layerMiss(this.layer, FailureKind.SOURCE_UNAVAILABLE, `SerpAPI HTTP ${response.status}`);
      }
      payload = asRecord(parseJson(response.body));
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      return layerMiss(this.layer, FailureKind.SOURCE_UNAVAILABLE, `SerpAPI sin respuesta: ${error.message}`);
    }

    if (!payload) {
      return layerMiss(this.layer, FailureKind.SOURCE_UNAVAILABLE, 'SerpAPI devolvió JSON inválido');
    }

    const found = this.extract(payload, searchUrl);
    if (!found) {
      return layerMiss(this.layer, FailureKind.PARSE_MISS, 'sin CNPJ en los resultados de búsqueda', searchUrl);
    }

    this.logger.log(`[Google] ✅ ${found.cnpjs.join(', ')} (${found.section})`);
    return layerHit(this.layer, found.cnpjs, found.sourceUrl, `CNPJ encontrado en ${found.section}`);
  }

  /** Primera sección de la respuesta con CNPJs válidos */
  extract(
    payload: JsonRecord,
    searchUrl: string,
  ): { cnpjs: string[]; sourceUrl: string; section: string } | null {
    const graph = asRecord(payload.knowledge_graph);
    const legalId = findValidCnpjs(asString(graph?.legal_identifier) ?? '');
    if (legalId.length > 0) {
      return {
        cnpjs: legalId,
        sourceUrl: asString(graph?.website) ?? searchUrl,
        section: 'knowledge_graph',
      };
    }

    const answerBox = asRecord(payload.answer_box);
    if (answerBox) {
      const text = ['answer', 'snippet', 'title']
        .map((key) => asString(answerBox[key]) ?? '')
        .join(' ');
      const cnpjs = findValidCnpjs(text);
      if (cnpjs.length > 0) {
        return { cnpjs, sourceUrl: asString(answerBox.link) ?? searchUrl, section: 'answer_box' };
      }
    }

    const cnpjs: string[] = [];
    let sourceUrl: string | null = null;
    for (const item of asArray(payload.organic_results).slice(0, this.settings.maxOrganicResults)) {
      const result = asRecord(item);
      if (!result) continue;

      const found = findValidCnpjs(`${asString(result.title) ?? ''} ${asString(result.snippet) ?? ''}`);
      if (found.length === 0) continue;

      sourceUrl = sourceUrl ?? asString(result.link);
      cnpjs.push(...found);
    }

    if (cnpjs.length === 0) return null;
    return { cnpjs: [...new Set(cnpjs)], sourceUrl: sourceUrl ?? searchUrl, section: 'organic_results' };
  }
}
