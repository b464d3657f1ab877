import { FetchResult } from '../entities/page-fetch-outcome.entity';
import { RetryPolicy } from '../entities/retry-policy.entity';

/**
 * Fetch "anti-bloqueo": rota proxies, aleatoriza headers, espera entre intentos
 * y clasifica cada respuesta según la política de la fuente.
 *
 * Nunca lanza por fallas de red: al agotar intentos devuelve `FetchExhausted`.
 * Solo propaga FatalResolutionError y OperationCancelledError.
 */
export interface PageFetcherPort {
  fetch(url: string, policy: RetryPolicy, signal?: AbortSignal): Promise<FetchResult>;
}

export const PAGE_FETCHER_PORT = Symbol('PAGE_FETCHER_PORT');
