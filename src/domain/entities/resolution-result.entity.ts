import { DiscoveryLayer } from '../enums/discovery-layer.enum';
import { ResolutionStatus } from '../enums/resolution-status.enum';

/**
 * Resultado de resolver el CNPJ principal de una empresa.
 * Entidad de dominio: se crea por empresa, la consume el orquestador y se descarta.
 */
export class ResolutionResult {
  /** Nombre de entrada tal como llegó */
  company: string;

  /** CNPJ seleccionado (formateado) o "" si no hubo */
  cnpj: string;

  /** URL de donde salió el CNPJ */
  sourceUrl: string | null;

  status: ResolutionStatus;

  /** Capa que produjo los candidatos */
  layer: DiscoveryLayer | null;

  /** Todos los candidatos válidos de esa capa, sin duplicados */
  candidates: string[];

  /** El registro público confirmó que el seleccionado es la matriz */
  headOfficeConfirmed: boolean;

  /** Rastro legible de qué capas se probaron y por qué fallaron */
  trail: string[];

  timestamp: Date;

  constructor(params: {
    company: string;
    status: ResolutionStatus;
    trail: string[];
    cnpj?: string;
    sourceUrl?: string | null;
    layer?: DiscoveryLayer | null;
    candidates?: string[];
    headOfficeConfirmed?: boolean;
  }) {
    this.company = params.company;
    this.status = params.status;
    this.trail = params.trail;
    this.cnpj = params.cnpj ?? '';
    this.sourceUrl = params.sourceUrl ?? null;
    this.layer = params.layer ?? null;
    this.candidates = params.candidates ?? [];
    this.headOfficeConfirmed = params.headOfficeConfirmed ?? false;
    this.timestamp = new Date();
  }

  get found(): boolean {
    return this.cnpj !== '';
  }

  /** Notas en una sola línea (formato de la fila del sink) */
  get notes(): string {
    return this.trail.join('; ');
  }
}
