import { BranchEntry } from '../../../domain/entities/branch-entry.entity';
import { PrimaryResultRecord, ResultSinkPort } from '../../../domain/ports/result-sink.port';
import { extractDigits } from '../../../shared/utils/cnpj';

/** Una fila de la planilla de resultados */
export interface ResultRow {
  company: string;
  /** "Matriz" para la fila principal, la etiqueta del directorio para filiales */
  label: string;
  cnpj: string;
  status: string;
  sourceUrl: string;
  notes: string;
  timestamp: string;
}

/** Estado de las filas de filiales */
export const BRANCH_ROW_STATUS = 'ok';

/**
 * Sink en memoria con la misma forma que la planilla:
 * las filiales quedan justo debajo de la fila de su matriz.
 */
export class InMemoryResultSink implements ResultSinkPort {
  private readonly rows: ResultRow[] = [];

  async appendPrimary(company: string, record: PrimaryResultRecord): Promise<void> {
    this.rows.push({
      company,
      label: record.cnpj ? 'Matriz' : '',
      cnpj: record.cnpj,
      status: record.status,
      sourceUrl: record.sourceUrl,
      notes: record.notes,
      timestamp: new Date().toISOString(),
    });
  }

  async appendBranches(
    company: string,
    anchorCnpj: string,
    entries: BranchEntry[],
    source: string,
  ): Promise<number> {
    const anchorDigits = extractDigits(anchorCnpj);
    const known = new Set(
      this.rows.filter((row) => row.company === company).map((row) => extractDigits(row.cnpj)),
    );

    const fresh: ResultRow[] = [];
    for (const entry of entries) {
      const digits = extractDigits(entry.cnpj);
      if (!digits || known.has(digits)) continue;
      known.add(digits);
      fresh.push({
        company,
        label: entry.label,
        cnpj: entry.cnpj,
        status: BRANCH_ROW_STATUS,
        sourceUrl: source,
        notes: '',
        timestamp: new Date().toISOString(),
      });
    }
    if (fresh.length === 0) return 0;

    const anchorIndex = this.findLastIndex(
      (row) => row.company === company && extractDigits(row.cnpj) === anchorDigits,
    );
    let insertAt = this.rows.length;
    if (anchorIndex !== -1) {
      // después del bloque de la empresa que empieza en la fila ancla
      insertAt = anchorIndex + 1;
      while (insertAt < this.rows.length && this.rows[insertAt].company === company) insertAt++;
    }
    this.rows.splice(insertAt, 0, ...fresh);

    return fresh.length;
  }

  getRows(): ResultRow[] {
    return this.rows.map((row) => ({ ...row }));
  }

  private findLastIndex(predicate: (row: ResultRow) => boolean): number {
    for (let i = this.rows.length - 1; i >= 0; i--) {
      if (predicate(this.rows[i])) return i;
    }
    return -1;
  }
}
