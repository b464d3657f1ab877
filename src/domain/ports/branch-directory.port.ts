import { RetryPolicy } from '../entities/retry-policy.entity';

/** Fila cruda tal como la muestra el directorio (CNPJ aún sin validar). */
export interface RawBranchRow {
  label: string;
  rawCnpj: string;
}

export interface BranchDirectoryPage {
  rows: RawBranchRow[];
  /** URLs absolutas de otras páginas del listado */
  pageLinks: string[];
}

/**
 * Sitio-directorio que lista las filiales de un CNPJ.
 * El recorrido (cola, visitados, deduplicación) lo hace el crawler;
 * el adaptador solo conoce URLs y HTML del sitio.
 */
export interface BranchDirectoryPort {
  readonly name: string;
  readonly retryPolicy: RetryPolicy;
  /**
   * Páginas iniciales del recorrido; la primera es la URL de referencia del listado.
   * Un sitio sin paginación devuelve aquí todas sus páginas.
   */
  buildSeedUrls(slug: string, cnpjDigits: string): string[];
  parsePage(html: string, pageUrl: string): BranchDirectoryPage;
}

export const BRANCH_DIRECTORY_PORT = Symbol('BRANCH_DIRECTORY_PORT');
