/** Datos mínimos del registro público para desambiguar candidatos. */
export interface RegistryRecord {
  cnpj: string;
  isHeadOffice: boolean;
  legalName: string | null;
  /** Endpoint que respondió */
  source: string;
}

/**
 * Registro de empresas consultado por CNPJ (Receita Federal vía APIs públicas).
 */
export interface CompanyRegistryPort {
  isEnabled(): boolean;

  /** null si ninguna API respondió o el CNPJ no existe */
  lookup(cnpj: string, signal?: AbortSignal): Promise<RegistryRecord | null>;
}

export const COMPANY_REGISTRY_PORT = Symbol('COMPANY_REGISTRY_PORT');
