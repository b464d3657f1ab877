import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ResolutionStatus } from '../../domain/enums/resolution-status.enum';
import { FailureKind, ResolutionError } from '../../domain/errors/resolution.errors';
import { ResultSinkPort } from '../../domain/ports/result-sink.port';
import { ScraperConfig } from '../../shared/config/scraper.config';
import { BranchCrawlerService } from './branch-crawler.service';
import { LayeredResolverService } from './layered-resolver.service';
import { SerializedResultSink } from './serialized-result-sink';

export interface BatchOptions {
  /** Además del CNPJ principal, enumerar filiales */
  includeBranches: boolean;
  /** Workers en paralelo (default: scraper.batch.maxConcurrency) */
  concurrency?: number;
}

export interface BatchSummary {
  total: number;
  success: number;
  multiple: number;
  notFound: number;
  errors: number;
  /** Filas de filiales efectivamente escritas */
  branches: number;
  /** La señal del llamador cortó el lote antes de terminar */
  cancelled: boolean;
}

/**
 * Procesa una lista de empresas con un pool acotado de workers.
 *
 * Todos los workers comparten el mismo cliente anti-bloqueo (y por lo tanto el mismo pool
 * de proxies). Una empresa que falla deja una fila `error` y el lote continúa.
 */
@Injectable()
export class CompanyBatchService {
  private readonly logger = new Logger(CompanyBatchService.name);
  private readonly settings: ScraperConfig['batch'];

  constructor(
    private readonly config: ConfigService,
    private readonly resolver: LayeredResolverService,
    private readonly crawler: BranchCrawlerService,
  ) {
    this.settings = this.config.getOrThrow<ScraperConfig['batch']>('scraper.batch');
  }

  async run(
    companies: string[],
    options: BatchOptions,
    sink: ResultSinkPort,
    signal?: AbortSignal,
  ): Promise<BatchSummary> {
    const summary: BatchSummary = {
      total: companies.length,
      success: 0,
      multiple: 0,
      notFound: 0,
      errors: 0,
      branches: 0,
      cancelled: false,
    };
    if (companies.length === 0) return summary;

    const output = new SerializedResultSink(sink);
    const workers = Math.max(
      1,
      Math.min(options.concurrency ?? this.settings.maxConcurrency, companies.length),
    );
    let nextIndex = 0;

    this.logger.log(`[Lote] 🔎 ${companies.length} empresas, ${workers} workers`);
    const startTime = Date.now();

    const worker = async (): Promise<void> => {
      while (nextIndex < companies.length) {
        if (signal?.aborted) {
          summary.cancelled = true;
          return;
        }
        const company = companies[nextIndex++];
        await this.processCompany(company, options, output, summary, signal);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    this.logger.log(
      `[Lote] ✅ ${summary.success} ok, ${summary.multiple} múltiples, ${summary.notFound} sin CNPJ, ` +
        `${summary.errors} errores, ${summary.branches} filiales (${Date.now() - startTime}ms)`,
    );
    return summary;
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private async processCompany(
    company: string,
    options: BatchOptions,
    sink: ResultSinkPort,
    summary: BatchSummary,
    parentSignal?: AbortSignal,
  ): Promise<void> {
    const scope = this.companyScope(parentSignal);
    let stage = 'resolver';

    try {
      const result = await this.resolver.resolve(company, scope.signal);
      this.count(result.status, summary);

      await sink.appendPrimary(company, {
        cnpj: result.cnpj,
        sourceUrl: result.sourceUrl ?? '',
        status: result.status,
        notes: result.notes,
      });

      if (!options.includeBranches || !result.found) return;

      stage = 'filiales';
      const crawl = await this.crawler.crawl(company, result.cnpj, scope.signal);
      summary.branches += await sink.appendBranches(company, result.cnpj, crawl.entries, crawl.seedUrl);
    } catch (error) {
      const kind = error instanceof ResolutionError ? error.kind : FailureKind.FATAL;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Lote] ❌ "${company}" (${stage}): ${message}`);

      summary.errors++;
      await sink.appendPrimary(company, {
        cnpj: '',
        sourceUrl: '',
        status: ResolutionStatus.ERROR,
        notes: `${stage}: [${kind}] ${message}`,
      });
    } finally {
      scope.dispose();
    }
  }

  private count(status: ResolutionStatus, summary: BatchSummary): void {
    switch (status) {
      case ResolutionStatus.SUCCESS:
        summary.success++;
        break;
      case ResolutionStatus.MULTIPLE:
        summary.multiple++;
        break;
      case ResolutionStatus.NOT_FOUND:
        summary.notFound++;
        break;
      case ResolutionStatus.ERROR:
        summary.errors++;
        break;
    }
  }

  /**
   * Señal por empresa: se aborta si el llamador cancela o si se agota
   * el presupuesto de tiempo (companyBudgetMs > 0).
   */
  private companyScope(parent?: AbortSignal): { signal?: AbortSignal; dispose: () => void } {
    const budgetMs = this.settings.companyBudgetMs;
    if (budgetMs <= 0) return { signal: parent, dispose: () => undefined };

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort();
    if (parent?.aborted) controller.abort();
    parent?.addEventListener('abort', onParentAbort, { once: true });

    const timer = setTimeout(() => controller.abort(), budgetMs);

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
      },
    };
  }
}
