import { FetchStatus } from '../enums/fetch-status.enum';

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface RetryPolicyOptions {
  /** Intentos totales (default 5) */
  maxAttempts: number;
  /** Espera aleatoria antes de CADA intento, para no generar ráfagas */
  delay: DelayRange;
  /** Timeout por request individual */
  timeoutMs: number;
  /** Cuerpos más cortos que esto se consideran páginas de bloqueo */
  minBodyLength: number;
  /** Estados HTTP que fuerzan rotar proxy y reintentar */
  rotateStatuses: readonly number[];
  /** Subcadenas (case-insensitive) que delatan un bloqueo/captcha */
  blockIndicators: readonly string[];
  /** Al menos una debe aparecer en el cuerpo; vacío = no se exige nada */
  expectedMarkers: readonly string[];
}

export interface FetchClassification {
  status: FetchStatus;
  reason: string;
}

/**
 * Política de reintentos parametrizable por fuente.
 * `classify` decide si un intento fue exitoso, bloqueado o un error transitorio.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delay: DelayRange;
  readonly timeoutMs: number;
  private readonly options: RetryPolicyOptions;

  constructor(options: RetryPolicyOptions) {
    this.options = {
      ...options,
      blockIndicators: options.blockIndicators.map((i) => i.toLowerCase()),
      expectedMarkers: options.expectedMarkers.map((m) => m.toLowerCase()),
    };
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.delay = {
      minMs: Math.max(0, options.delay.minMs),
      maxMs: Math.max(options.delay.minMs, options.delay.maxMs),
    };
    this.timeoutMs = options.timeoutMs;
  }

  /** Misma política con otros marcadores de contenido esperado */
  withExpectedMarkers(markers: readonly string[]): RetryPolicy {
    return new RetryPolicy({ ...this.options, expectedMarkers: markers });
  }

  classify(httpStatus: number, body: string): FetchClassification {
    if (this.options.rotateStatuses.includes(httpStatus)) {
      return { status: FetchStatus.BLOCKED, reason: `HTTP ${httpStatus}` };
    }

    if (httpStatus !== 200) {
      return { status: FetchStatus.TRANSIENT_ERROR, reason: `HTTP ${httpStatus}` };
    }

    if (body.length < this.options.minBodyLength) {
      return {
        status: FetchStatus.BLOCKED,
        reason: `cuerpo demasiado corto (${body.length} chars)`,
      };
    }

    const lower = body.toLowerCase();
    const indicator = this.options.blockIndicators.find((i) => lower.includes(i));
    if (indicator) {
      return { status: FetchStatus.BLOCKED, reason: `indicador de bloqueo "${indicator}"` };
    }

    const markers = this.options.expectedMarkers;
    if (markers.length > 0 && !markers.some((m) => lower.includes(m))) {
      return { status: FetchStatus.TRANSIENT_ERROR, reason: 'contenido esperado ausente' };
    }

    return { status: FetchStatus.OK, reason: `${body.length} chars` };
  }
}
