import { Inject, Injectable, Logger } from '@nestjs/common';
import { BranchCrawlResult, BranchEntry } from '../../domain/entities/branch-entry.entity';
import { Cnpj } from '../../domain/entities/cnpj.entity';
import { FetchResult } from '../../domain/entities/page-fetch-outcome.entity';
import {
  FatalResolutionError,
  InvalidInputError,
  OperationCancelledError,
} from '../../domain/errors/resolution.errors';
import { BRANCH_DIRECTORY_PORT, BranchDirectoryPort } from '../../domain/ports/branch-directory.port';
import { PAGE_FETCHER_PORT, PageFetcherPort } from '../../domain/ports/page-fetcher.port';
import { normalizeSlug } from '../../shared/utils/slug';

/**
 * Enumera las filiales de una empresa recorriendo el listado paginado del directorio.
 *
 * 1. Pide al directorio las páginas iniciales (slug del nombre + 14 dígitos del CNPJ principal).
 * 2. Recorre la cola FIFO de páginas; cada página se visita a lo sumo una vez.
 * 3. Las filas con checksum inválido se descartan; el CNPJ principal se excluye.
 * 4. Una página que no se pudo descargar se salta, el resto del recorrido sigue.
 */
@Injectable()
export class BranchCrawlerService {
  private readonly logger = new Logger(BranchCrawlerService.name);

  constructor(
    @Inject(PAGE_FETCHER_PORT) private readonly fetcher: PageFetcherPort,
    @Inject(BRANCH_DIRECTORY_PORT) private readonly directory: BranchDirectoryPort,
  ) {}

  async crawl(
    companyName: string,
    primaryCnpj: string,
    signal?: AbortSignal,
  ): Promise<BranchCrawlResult> {
    const slug = normalizeSlug(companyName);
    if (!slug) {
      throw new InvalidInputError(`Nombre de empresa inutilizable: "${companyName}"`);
    }

    const primary = Cnpj.parse(primaryCnpj);
    if (!primary) {
      throw new InvalidInputError(`CNPJ principal inválido: "${primaryCnpj}"`);
    }

    const seeds = [
      ...new Set(this.directory.buildSeedUrls(slug, primary.digits).map((url) => this.canonicalize(url))),
    ];
    const [seedUrl] = seeds;
    if (seedUrl === undefined) {
      throw new FatalResolutionError(`${this.directory.name} no definió páginas iniciales`);
    }

    const result: BranchCrawlResult = {
      company: companyName,
      primaryCnpj: primary.formatted,
      seedUrl,
      entries: [],
      pagesVisited: 0,
      failedPages: [],
      discardedRows: 0,
      cancelled: false,
    };

    const byDigits = new Map<string, BranchEntry>();
    const queue: string[] = [...seeds];
    const queued = new Set<string>(seeds);
    const visited = new Set<string>();

    this.logger.log(
      `[Filiales] 🔎 ${companyName} (${primary.formatted}) en ${this.directory.name} → ${seedUrl}`,
    );

    while (queue.length > 0) {
      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const url = queue.shift();
      if (url === undefined || visited.has(url)) continue;
      visited.add(url);

      let fetched: FetchResult;
      try {
        fetched = await this.fetcher.fetch(url, this.directory.retryPolicy, signal);
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          result.cancelled = true;
          break;
        }
        throw error;
      }

      if (!fetched.ok) {
        this.logger.warn(`[Filiales] ⚠️ Página saltada tras ${fetched.attempts} intentos: ${url}`);
        result.failedPages.push(url);
        continue;
      }

      result.pagesVisited++;
      const page = this.directory.parsePage(fetched.body, url);

      for (const row of page.rows) {
        const cnpj = Cnpj.parse(row.rawCnpj);
        if (!cnpj) {
          result.discardedRows++;
          continue;
        }
        if (cnpj.equals(primary)) continue;
        byDigits.set(cnpj.digits, { label: row.label, cnpj: cnpj.formatted });
      }

      for (const link of page.pageLinks) {
        const next = this.canonicalize(link);
        if (visited.has(next) || queued.has(next)) continue;
        queued.add(next);
        queue.push(next);
      }
    }

    result.entries = [...byDigits.values()];

    this.logger.log(
      `[Filiales] ${result.cancelled ? '⚠️ Cancelado' : '✅'} ${companyName}: ${result.entries.length} filiales, ` +
        `${result.pagesVisited} páginas, ${result.failedPages.length} fallidas, ${result.discardedRows} descartadas`,
    );

    return result;
  }

  /** URL absoluta sin fragmento; la query se conserva tal cual */
  private canonicalize(url: string): string {
    try {
      const parsed = new URL(url);
      parsed.hash = '';
      return parsed.href;
    } catch {
      throw new FatalResolutionError(`URL de directorio inválida: "${url}"`);
    }
  }
}
