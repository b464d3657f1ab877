import { FetchStatus } from '../enums/fetch-status.enum';

/**
 * Resultado de UN intento HTTP. Vive solo dentro del loop de reintentos
 * (y en el reporte de fallo cuando se agotan).
 */
export interface PageFetchOutcome {
  attempt: number;
  status: FetchStatus;
  /** Estado HTTP, 0 si no hubo respuesta (timeout, conexión) */
  httpStatus: number;
  reason: string;
  /** host:port del proxy usado, null si fue directo */
  proxy: string | null;
  body: string | null;
}

export type FetchResult =
  | { ok: true; body: string; attempts: number; outcome: PageFetchOutcome }
  | { ok: false; reason: 'FetchExhausted'; attempts: number; outcomes: PageFetchOutcome[] };
