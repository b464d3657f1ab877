import { ProxyEndpoint } from '../entities/proxy-pool.entity';
import { SourceUnavailableError } from '../errors/resolution.errors';

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
  /** null/undefined = conexión directa */
  proxy?: ProxyEndpoint | null;
  /** Redirecciones a seguir (default 0) */
  maxRedirects?: number;
}

export interface HttpResponse {
  status: number;
  body: string;
  /** URL final tras seguir redirecciones */
  url: string;
}

/**
 * GET HTTP de bajo nivel, sin reintentos ni clasificación.
 * Rechaza con TransportError ante timeout o error de red,
 * y con FatalResolutionError si la URL es inválida.
 */
export interface HttpTransportPort {
  get(request: HttpRequest): Promise<HttpResponse>;
}

export const HTTP_TRANSPORT = Symbol('HTTP_TRANSPORT');

export type TransportErrorCode = 'TIMEOUT' | 'NETWORK' | 'TOO_MANY_REDIRECTS';

export class TransportError extends SourceUnavailableError {
  constructor(
    message: string,
    readonly code: TransportErrorCode,
  ) {
    super(message);
  }
}
