import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LayerOutcome, layerHit, layerMiss } from '../../../domain/entities/layer-outcome.entity';
import { DiscoveryLayer } from '../../../domain/enums/discovery-layer.enum';
import {
  FailureKind,
  SourceUnavailableError,
  throwIfCancelled,
} from '../../../domain/errors/resolution.errors';
import { CLOCK, ClockPort } from '../../../domain/ports/clock.port';
import { DiscoveryLayerPort } from '../../../domain/ports/discovery-layer.port';
import { HTTP_TRANSPORT, HttpResponse, HttpTransportPort } from '../../../domain/ports/http-transport.port';
import { ScraperConfig } from '../../../shared/config/scraper.config';
import { findValidCnpjs } from '../../../shared/utils/cnpj';
import { generateDomainCandidates } from '../../../shared/utils/slug';
import { visibleText } from './visible-text';

/**
 * Capa 1: web propia de la empresa.
 *
 * Prueba dominios derivados del nombre (slug.com.br, slug.com, ...) con un GET simple,
 * sin proxy ni reintentos. El primer sitio cuyo texto visible tenga un CNPJ válido gana;
 * suele estar en el footer.
 */
@Injectable()
export class WebsiteDiscoveryAdapter implements DiscoveryLayerPort {
  readonly layer = DiscoveryLayer.WEBSITE;
  private readonly logger = new Logger(WebsiteDiscoveryAdapter.name);
  private readonly settings: ScraperConfig['website'];
  private readonly userAgent: string;

  constructor(
    private readonly config: ConfigService,
    @Inject(HTTP_TRANSPORT) private readonly transport: HttpTransportPort,
    @Inject(CLOCK) private readonly clock: ClockPort,
  ) {
    this.settings = this.config.getOrThrow<ScraperConfig['website']>('scraper.website');
    this.userAgent = this.config.getOrThrow<string[]>('scraper.userAgents')[0];
  }

  isEnabled(): boolean {
    return true;
  }

  async attempt(companyName: string, signal?: AbortSignal): Promise<LayerOutcome> {
    const domains = generateDomainCandidates(companyName);
    if (domains.length === 0) {
      return layerMiss(this.layer, FailureKind.PARSE_MISS, 'sin dominios candidatos para el nombre');
    }

    let answered = 0;

    for (let i = 0; i < domains.length; i++) {
      throwIfCancelled(signal);
      if (i > 0) await this.clock.sleep(this.settings.politeDelayMs);

      const url = `https://${domains[i]}`;
      let response: HttpResponse;
      try {
        response = await this.transport.get({
          url,
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'text/html,application/xhtml+xml',
            'Accept-Language': 'pt-BR,pt;q=0.9',
            'Accept-Encoding': 'gzip, deflate, br',
          },
          timeoutMs: this.settings.timeoutMs,
          maxRedirects: this.settings.maxRedirects,
        });
      } catch (error) {
        if (!(error instanceof SourceUnavailableError)) throw error;
        this.logger.debug(`[Web] ${url} sin respuesta: ${error.message}`);
        continue;
      }

      if (response.status !== 200) {
        this.logger.debug(`[Web] ${url} → HTTP ${response.status}`);
        continue;
      }

      answered++;
      const cnpjs = findValidCnpjs(visibleText(response.body));
      if (cnpjs.length > 0) {
        this.logger.log(`[Web] ✅ ${cnpjs.length} CNPJ(s) en ${response.url}`);
        return layerHit(this.layer, cnpjs, response.url, `CNPJ encontrado en ${response.url}`);
      }
    }

    if (answered === 0) {
      return layerMiss(
        this.layer,
        FailureKind.SOURCE_UNAVAILABLE,
        `ningún dominio respondió (${domains.join(', ')})`,
      );
    }
    return layerMiss(
      this.layer,
      FailureKind.PARSE_MISS,
      `${answered} sitio(s) sin CNPJ válido`,
    );
  }
}
