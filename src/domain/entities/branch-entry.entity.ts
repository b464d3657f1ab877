/**
 * Una fila del listado de filiales: etiqueta libre del sitio ("Matriz", "Filial", ...)
 * y CNPJ formateado. La identidad es el CNPJ, no la etiqueta.
 */
export interface BranchEntry {
  label: string;
  cnpj: string;
}

/** Resultado de recorrer todas las páginas de filiales de una empresa. */
export interface BranchCrawlResult {
  company: string;
  primaryCnpj: string;
  seedUrl: string;
  /** Filiales únicas, sin el CNPJ principal */
  entries: BranchEntry[];
  pagesVisited: number;
  /** Páginas que no se pudieron descargar (se saltan) */
  failedPages: string[];
  /** Filas con forma de CNPJ pero checksum inválido */
  discardedRows: number;
  cancelled: boolean;
}
