import { DiscoveryLayer } from '../enums/discovery-layer.enum';
import { FailureKind } from '../errors/resolution.errors';

/**
 * Lo que devuelve una capa de descubrimiento.
 * `candidates` vacío + `failure` indica por qué no encontró nada.
 */
export interface LayerOutcome {
  layer: DiscoveryLayer;
  candidates: string[];
  sourceUrl: string | null;
  note: string;
  failure?: FailureKind;
}

export function layerHit(
  layer: DiscoveryLayer,
  candidates: string[],
  sourceUrl: string | null,
  note: string,
): LayerOutcome {
  return { layer, candidates, sourceUrl, note };
}

export function layerMiss(
  layer: DiscoveryLayer,
  failure: FailureKind,
  note: string,
  sourceUrl: string | null = null,
): LayerOutcome {
  return { layer, candidates: [], sourceUrl, note, failure };
}
