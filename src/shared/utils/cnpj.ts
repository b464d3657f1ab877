/**
 * Utilidades de CNPJ (Cadastro Nacional da Pessoa Jurídica).
 *
 * Representación interna: 14 dígitos sin puntuación ("11222333000181").
 * Representación externa: "11.222.333/0001-81".
 *
 * Todas las funciones son puras.
 */

const FIRST_CHECK_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const SECOND_CHECK_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

const FORMATTED_PATTERN = /\d{2}\.\d{3}\.\d{3}\/\d{4}-\d{2}/g;
const RAW_PATTERN = /\b\d{14}\b/g;

/** Quita todo lo que no sea dígito. */
export function extractDigits(value: string): string {
  return value.replace(/\D/g, '');
}

/** Dígito verificador módulo 11 sobre los primeros `weights.length` dígitos. */
function checkDigit(digits: string, weights: number[]): number {
  const sum = weights.reduce((acc, weight, i) => acc + Number(digits[i]) * weight, 0);
  const remainder = sum % 11;
  return remainder < 2 ? 0 : 11 - remainder;
}

/**
 * Valida un CNPJ de 14 dígitos (sin puntuación).
 * Un CNPJ con los 14 dígitos iguales nunca es válido, aunque cuadre el checksum.
 */
export function isValidCnpj(digits14: string): boolean {
  if (!/^\d{14}$/.test(digits14)) return false;
  if (/^(\d)\1{13}$/.test(digits14)) return false;

  if (checkDigit(digits14, FIRST_CHECK_WEIGHTS) !== Number(digits14[12])) {
    return false;
  }
  return checkDigit(digits14, SECOND_CHECK_WEIGHTS) === Number(digits14[13]);
}

/** Valida un CNPJ en cualquier formato ("11.222.333/0001-81", "11222333000181", ...). */
export function validateCnpj(value: string): boolean {
  return isValidCnpj(extractDigits(value));
}

/** "11222333000181" → "11.222.333/0001-81". null si no hay exactamente 14 dígitos. */
export function formatCnpj(value: string): string | null {
  const d = extractDigits(value);
  if (d.length !== 14) return null;
  return `${d.slice(0, 2)}.${d.slice(2, 5)}.${d.slice(5, 8)}/${d.slice(8, 12)}-${d.slice(12, 14)}`;
}

/**
 * Extrae todos los candidatos a CNPJ de un texto libre (sin validar checksum).
 * Primero los ya puntuados, luego las corridas de 14 dígitos.
 * Resultado formateado, sin duplicados, en orden de aparición.
 */
export function extractCnpjCandidates(text: string): string[] {
  if (!text) return [];

  const seen = new Set<string>();
  const matches = [
    ...(text.match(FORMATTED_PATTERN) ?? []),
    ...(text.match(RAW_PATTERN) ?? []),
  ];

  for (const match of matches) {
    const formatted = formatCnpj(match);
    if (formatted) seen.add(formatted);
  }

  return [...seen];
}

/** Candidatos con checksum válido. Los inválidos se descartan sin ruido. */
export function findValidCnpjs(text: string): string[] {
  return extractCnpjCandidates(text).filter(validateCnpj);
}
