import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LayerOutcome } from '../../domain/entities/layer-outcome.entity';
import { ResolutionResult } from '../../domain/entities/resolution-result.entity';
import { DiscoveryLayer } from '../../domain/enums/discovery-layer.enum';
import { ResolutionStatus } from '../../domain/enums/resolution-status.enum';
import {
  FailureKind,
  OperationCancelledError,
  ResolutionError,
  throwIfCancelled,
} from '../../domain/errors/resolution.errors';
import { CLOCK, ClockPort } from '../../domain/ports/clock.port';
import { COMPANY_REGISTRY_PORT, CompanyRegistryPort } from '../../domain/ports/company-registry.port';
import { DISCOVERY_LAYERS, DiscoveryLayerPort } from '../../domain/ports/discovery-layer.port';
import { ScraperConfig } from '../../shared/config/scraper.config';
import { normalizeSlug } from '../../shared/utils/slug';

/**
 * Resuelve el CNPJ principal de una empresa probando capas por prioridad.
 *
 * - La primera capa que devuelve candidatos válidos gana; las demás no se consultan.
 * - Con varios candidatos, el registro público (si está habilitado) elige la matriz.
 * - Cada capa probada u omitida deja una línea en el rastro (`trail`).
 * - Solo la entrada inválida, un error fatal o la cancelación terminan en `error`.
 */
@Injectable()
export class LayeredResolverService {
  private readonly logger = new Logger(LayeredResolverService.name);
  private readonly layers: Map<DiscoveryLayer, DiscoveryLayerPort>;
  private readonly settings: ScraperConfig['resolver'];

  constructor(
    private readonly config: ConfigService,
    @Inject(DISCOVERY_LAYERS) layers: DiscoveryLayerPort[],
    @Inject(COMPANY_REGISTRY_PORT) private readonly registry: CompanyRegistryPort,
    @Inject(CLOCK) private readonly clock: ClockPort,
  ) {
    this.layers = new Map(layers.map((layer) => [layer.layer, layer]));
    this.settings = this.config.getOrThrow<ScraperConfig['resolver']>('scraper.resolver');
  }

  /** Orden efectivo de las capas */
  get priority(): DiscoveryLayer[] {
    return [...this.settings.layerPriority];
  }

  async resolve(companyName: string, signal?: AbortSignal): Promise<ResolutionResult> {
    const trail: string[] = [];

    if (!normalizeSlug(companyName.trim())) {
      trail.push(`entrada: [${FailureKind.INVALID_INPUT}] nombre de empresa vacío o inutilizable`);
      return new ResolutionResult({ company: companyName, status: ResolutionStatus.ERROR, trail });
    }

    this.logger.log(`[Resolver] 🔎 "${companyName}" (capas: ${this.settings.layerPriority.join(' → ')})`);

    try {
      let attempted = 0;

      for (const id of this.settings.layerPriority) {
        const layer = this.layers.get(id);
        if (!layer || !layer.isEnabled()) {
          trail.push(`${id}: omitida (no configurada)`);
          continue;
        }

        throwIfCancelled(signal);
        if (attempted > 0) await this.clock.sleep(this.settings.layerDelayMs);
        attempted++;

        const outcome = await layer.attempt(companyName, signal);
        if (outcome.candidates.length === 0) {
          trail.push(`${id}: [${outcome.failure ?? FailureKind.PARSE_MISS}] ${outcome.note}`);
          this.logger.debug(`[Resolver] ${id} sin candidatos: ${outcome.note}`);
          continue;
        }

        trail.push(`${id}: ${outcome.note}`);
        return await this.select(companyName, outcome, trail, signal);
      }

      this.logger.warn(`[Resolver] ❌ "${companyName}": ninguna capa encontró CNPJ`);
      return new ResolutionResult({ company: companyName, status: ResolutionStatus.NOT_FOUND, trail });
    } catch (error) {
      return this.failed(companyName, error, trail);
    }
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private async select(
    companyName: string,
    outcome: LayerOutcome,
    trail: string[],
    signal?: AbortSignal,
  ): Promise<ResolutionResult> {
    const candidates = [...new Set(outcome.candidates)];
    const base = {
      company: companyName,
      sourceUrl: outcome.sourceUrl,
      layer: outcome.layer,
      candidates,
      trail,
    };

    if (candidates.length === 1) {
      this.logger.log(`[Resolver] ✅ "${companyName}" → ${candidates[0]} (${outcome.layer})`);
      return new ResolutionResult({ ...base, status: ResolutionStatus.SUCCESS, cnpj: candidates[0] });
    }

    trail.push(
      `[${FailureKind.AMBIGUOUS_RESULT}] ${candidates.length} CNPJs encontrados: ${candidates.join(', ')}`,
    );

    let selected = candidates[0];
    let headOfficeConfirmed = false;

    if (this.registry.isEnabled()) {
      try {
        for (const candidate of candidates) {
          throwIfCancelled(signal);
          const record = await this.registry.lookup(candidate, signal);
          if (record?.isHeadOffice) {
            selected = candidate;
            headOfficeConfirmed = true;
            break;
          }
        }
        trail.push(
          headOfficeConfirmed
            ? `registro: ${selected} confirmado como matriz`
            : `registro: ninguna matriz confirmada, se conserva el primero (${selected})`,
        );
      } catch (error) {
        // los candidatos ya validados no se pierden: queda el primero, sin confirmar
        const kind = error instanceof ResolutionError ? error.kind : FailureKind.FATAL;
        const message = error instanceof Error ? error.message : String(error);
        trail.push(`registro interrumpido: [${kind}] ${message}, se conserva el primero (${selected})`);
        this.logger.warn(`[Resolver] Registro interrumpido para "${companyName}": ${message}`);
      }
    } else {
      trail.push(`registro: deshabilitado, se conserva el primero (${selected})`);
    }

    this.logger.log(
      `[Resolver] ⚠️ "${companyName}" → ${selected} entre ${candidates.length} candidatos` +
        (headOfficeConfirmed ? ' (matriz confirmada)' : ''),
    );

    return new ResolutionResult({
      ...base,
      status: ResolutionStatus.MULTIPLE,
      cnpj: selected,
      headOfficeConfirmed,
    });
  }

  private failed(companyName: string, error: unknown, trail: string[]): ResolutionResult {
    if (error instanceof OperationCancelledError) {
      trail.push(`[${error.kind}] ${error.message}`);
      this.logger.warn(`[Resolver] "${companyName}" cancelado`);
    } else if (error instanceof ResolutionError) {
      trail.push(`[${error.kind}] ${error.message}`);
      this.logger.error(`[Resolver] ❌ "${companyName}": ${error.message}`);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      trail.push(`[${FailureKind.FATAL}] ${message}`);
      this.logger.error(`[Resolver] ❌ "${companyName}" error inesperado: ${message}`);
    }

    return new ResolutionResult({ company: companyName, status: ResolutionStatus.ERROR, trail });
  }
}
