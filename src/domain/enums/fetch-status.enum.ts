/** Clasificación de un intento HTTP individual. */
export enum FetchStatus {
  OK = 'ok',
  BLOCKED = 'blocked',
  TRANSIENT_ERROR = 'transient_error',
  FATAL_ERROR = 'fatal_error',
}
