/**
 * Taxonomía de fallas del motor de resolución.
 *
 * Solo InvalidInput, Fatal y Cancelled viajan como excepciones.
 * SourceUnavailable / ParseMiss se reportan como resultados de capa o página,
 * ChecksumInvalid se descarta en silencio y AmbiguousResult es el estado "multiple".
 */
export enum FailureKind {
  INVALID_INPUT = 'InvalidInput',
  SOURCE_UNAVAILABLE = 'SourceUnavailable',
  PARSE_MISS = 'ParseMiss',
  CHECKSUM_INVALID = 'ChecksumInvalid',
  AMBIGUOUS_RESULT = 'AmbiguousResult',
  FATAL = 'Fatal',
  CANCELLED = 'Cancelled',
}

export abstract class ResolutionError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Nombre de empresa o CNPJ de entrada inutilizable. */
export class InvalidInputError extends ResolutionError {
  readonly kind = FailureKind.INVALID_INPUT;
}

/** Una fuente no respondió tras agotar los reintentos. */
export class SourceUnavailableError extends ResolutionError {
  readonly kind = FailureKind.SOURCE_UNAVAILABLE;
}

/** Falla inesperada o configuración mal formada: aborta la empresa completa. */
export class FatalResolutionError extends ResolutionError {
  readonly kind = FailureKind.FATAL;
}

/** La señal de cancelación se disparó antes de terminar. */
export class OperationCancelledError extends ResolutionError {
  readonly kind = FailureKind.CANCELLED;

  constructor(message = 'Operación cancelada') {
    super(message);
  }
}

/** Lanza OperationCancelledError si la señal ya fue abortada. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}
