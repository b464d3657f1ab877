/** Sitio del que se enumeran las filiales. */
export enum BranchDirectorySource {
  /** diretoriobrasil.net: listado paginado con `?p=N` */
  DIRETORIO_BRASIL = 'diretoriobrasil',

  /** cnpj.biz: ficha, filiales y empresas relacionadas (tres páginas fijas) */
  CNPJ_BIZ = 'cnpjbiz',
}

export function isBranchDirectorySource(value: string): value is BranchDirectorySource {
  return Object.values(BranchDirectorySource).some((source) => source === value);
}
