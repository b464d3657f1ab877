import { extractDigits, formatCnpj, isValidCnpj } from '../../shared/utils/cnpj';

/**
 * CNPJ validado e inmutable.
 * Solo se construye vía `Cnpj.parse`, que garantiza checksum correcto.
 */
export class Cnpj {
  private constructor(readonly digits: string) {
    Object.freeze(this);
  }

  static parse(value: string): Cnpj | null {
    const digits = extractDigits(value);
    return isValidCnpj(digits) ? new Cnpj(digits) : null;
  }

  /** "11.222.333/0001-81" */
  get formatted(): string {
    return formatCnpj(this.digits) ?? this.digits;
  }

  /** Raíz de 8 dígitos compartida por matriz y filiales */
  get root(): string {
    return this.digits.slice(0, 8);
  }

  /** Número de establecimiento (dígitos 9-12) */
  get order(): string {
    return this.digits.slice(8, 12);
  }

  /**
   * Orden "0001" suele ser la matriz. Es solo una pista:
   * la confirmación real viene del registro público.
   */
  get isHeadOfficeOrder(): boolean {
    return this.order === '0001';
  }

  equals(other: Cnpj): boolean {
    return this.digits === other.digits;
  }

  toString(): string {
    return this.formatted;
  }
}
