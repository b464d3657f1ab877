import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SourceUnavailableError,
  throwIfCancelled,
} from '../../domain/errors/resolution.errors';
import { CLOCK, ClockPort } from '../../domain/ports/clock.port';
import { CompanyRegistryPort, RegistryRecord } from '../../domain/ports/company-registry.port';
import { HTTP_TRANSPORT, HttpTransportPort } from '../../domain/ports/http-transport.port';
import { ScraperConfig } from '../../shared/config/scraper.config';
import { extractDigits } from '../../shared/utils/cnpj';
import { JsonRecord, asRecord, asString, parseJson } from '../../shared/utils/json';

/**
 * Registro público de CNPJ (datos de la Receita Federal).
 * Prueba cada endpoint en orden (publica.cnpj.ws → minhareceita.org) hasta que uno responda.
 */
@Injectable()
export class PublicRegistryHttpAdapter implements CompanyRegistryPort {
  private readonly logger = new Logger(PublicRegistryHttpAdapter.name);
  private readonly settings: ScraperConfig['registry'];

  constructor(
    private readonly config: ConfigService,
    @Inject(HTTP_TRANSPORT) private readonly transport: HttpTransportPort,
    @Inject(CLOCK) private readonly clock: ClockPort,
  ) {
    this.settings = this.config.getOrThrow<ScraperConfig['registry']>('scraper.registry');
  }

  isEnabled(): boolean {
    return this.settings.enabled && this.settings.endpoints.length > 0;
  }

  async lookup(cnpj: string, signal?: AbortSignal): Promise<RegistryRecord | null> {
    const digits = extractDigits(cnpj);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.settings.apiToken) headers['x_api_token'] = this.settings.apiToken;

    for (let i = 0; i < this.settings.endpoints.length; i++) {
      throwIfCancelled(signal);
      if (i > 0) await this.clock.sleep(this.settings.politeDelayMs);

      const url = this.settings.endpoints[i].replace('{cnpj}', digits);
      try {
        const response = await this.transport.get({
          url,
          headers,
          timeoutMs: this.settings.timeoutMs,
        });
        const data = asRecord(parseJson(response.body));
        if (response.status !== 200 || !data) {
          this.logger.warn(`[Registro] ${url} → HTTP ${response.status}`);
          continue;
        }
        return PublicRegistryHttpAdapter.toRecord(digits, data, url);
      } catch (error) {
        if (!(error instanceof SourceUnavailableError)) throw error;
        this.logger.warn(`[Registro] ${url} sin respuesta: ${error.message}`);
      }
    }

    return null;
  }

  /** Los dos proveedores usan esquemas distintos; basta con que uno de los campos marque matriz */
  static toRecord(digits: string, data: JsonRecord, source: string): RegistryRecord {
    const establishment = asRecord(data.estabelecimento);
    const description = asString(data.descricao_identificador_matriz_filial) ?? '';
    const kind = asString(establishment?.tipo) ?? '';

    return {
      cnpj: digits,
      isHeadOffice:
        data.identificador_matriz_filial === 1 ||
        description.toUpperCase() === 'MATRIZ' ||
        kind.toLowerCase() === 'matriz',
      legalName: asString(data.razao_social),
      source,
    };
  }
}
