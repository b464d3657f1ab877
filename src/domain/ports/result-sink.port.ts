import { BranchEntry } from '../entities/branch-entry.entity';
import { ResolutionStatus } from '../enums/resolution-status.enum';

export interface PrimaryResultRecord {
  cnpj: string;
  sourceUrl: string;
  status: ResolutionStatus;
  notes: string;
}

/**
 * Destino de los resultados (hoja de cálculo, CSV, memoria...).
 * El motor nunca conoce la tecnología de persistencia; la deduplicación
 * contra corridas anteriores es responsabilidad del sink.
 */
export interface ResultSinkPort {
  appendPrimary(company: string, record: PrimaryResultRecord): Promise<void>;

  /**
   * Agrega filiales debajo de la fila ancla (company + anchorCnpj).
   * @returns filas efectivamente escritas
   */
  appendBranches(
    company: string,
    anchorCnpj: string,
    entries: BranchEntry[],
    source: string,
  ): Promise<number>;
}
