/** Estado final de la resolución de una empresa. */
export enum ResolutionStatus {
  /** Exactamente un CNPJ candidato */
  SUCCESS = 'success',

  /** Más de un candidato, se aplicó desambiguación */
  MULTIPLE = 'multiple',

  /** Ninguna capa produjo candidatos */
  NOT_FOUND = 'not_found',

  /** Falla no recuperable (entrada inválida, configuración, cancelación) */
  ERROR = 'error',
}
