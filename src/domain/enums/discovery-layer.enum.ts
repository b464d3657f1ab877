/**
 * Capas de descubrimiento del CNPJ principal.
 * Cada capa es una fuente independiente; se prueban en orden de prioridad.
 */
export enum DiscoveryLayer {
  /** Web propia de la empresa ({slug}.com.br, {slug}.com, ...) */
  WEBSITE = 'website',

  /** Infobox de Wikipedia en portugués (API search + parse) */
  ENCYCLOPEDIA = 'encyclopedia',

  /** Google vía SerpAPI, solo si hay API key configurada */
  SEARCH_ENGINE = 'search_engine',
}

/** Orden por defecto: web propia → enciclopedia → buscador */
export const DEFAULT_LAYER_PRIORITY: DiscoveryLayer[] = [
  DiscoveryLayer.WEBSITE,
  DiscoveryLayer.ENCYCLOPEDIA,
  DiscoveryLayer.SEARCH_ENGINE,
];

export function isDiscoveryLayer(value: string): value is DiscoveryLayer {
  return Object.values(DiscoveryLayer).some((layer) => layer === value);
}
