import { LayerOutcome } from '../entities/layer-outcome.entity';
import { DiscoveryLayer } from '../enums/discovery-layer.enum';

/**
 * Puerto (interfaz) de una capa de descubrimiento del CNPJ principal.
 * Parte del dominio, no conoce frameworks ni infraestructura.
 */
export interface DiscoveryLayerPort {
  /** Identificador de la capa */
  readonly layer: DiscoveryLayer;

  /** ¿Tiene lo necesario para correr? (p.ej. API key) */
  isEnabled(): boolean;

  /**
   * Busca candidatos a CNPJ para la empresa.
   * Las fallas no fatales vuelven como `LayerOutcome` con `failure`;
   * solo FatalResolutionError / OperationCancelledError se lanzan.
   */
  attempt(companyName: string, signal?: AbortSignal): Promise<LayerOutcome>;
}

/** Token para la lista de todas las capas disponibles */
export const DISCOVERY_LAYERS = Symbol('DISCOVERY_LAYERS');
