import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cheerio from 'cheerio';
import { RetryPolicy } from '../../domain/entities/retry-policy.entity';
import {
  BranchDirectoryPage,
  BranchDirectoryPort,
  RawBranchRow,
} from '../../domain/ports/branch-directory.port';
import { ScraperConfig } from '../../shared/config/scraper.config';
import { extractCnpjCandidates } from '../../shared/utils/cnpj';

/**
 * Adaptador cnpj.biz: la ficha del CNPJ, sus filiales y las empresas relacionadas.
 *
 * No hay paginación; las tres páginas se recorren siempre.
 * Filas: `table tr` con razón social, CNPJ y (opcional) tipo en la última celda.
 */
@Injectable()
export class CnpjBizDirectoryAdapter implements BranchDirectoryPort {
  readonly name = 'cnpj.biz';
  readonly retryPolicy: RetryPolicy;
  private readonly baseUrl: string;

  constructor(private readonly config: ConfigService) {
    const http = this.config.getOrThrow<ScraperConfig['http']>('scraper.http');
    const site = this.config.getOrThrow<ScraperConfig['cnpjBiz']>('scraper.cnpjBiz');

    this.baseUrl = site.baseUrl.replace(/\/+$/, '');
    this.retryPolicy = new RetryPolicy({ ...http, expectedMarkers: site.expectedMarkers });
  }

  // el slug no forma parte de las URLs de este sitio
  buildSeedUrls(_slug: string, cnpjDigits: string): string[] {
    return [
      `${this.baseUrl}/${cnpjDigits}`,
      `${this.baseUrl}/cnpj/${cnpjDigits}/filiais`,
      `${this.baseUrl}/cnpj/${cnpjDigits}/empresas-relacionadas`,
    ];
  }

  parsePage(html: string, _pageUrl: string): BranchDirectoryPage {
    const $ = cheerio.load(html);
    const rows: RawBranchRow[] = [];

    $('table tr').each((_, el) => {
      const cells = $(el)
        .find('td')
        .map((__, td) => $(td).text().replace(/\s+/g, ' ').trim())
        .get();
      if (cells.length < 2) return;

      const [rawCnpj] = extractCnpjCandidates(cells[1]);
      if (!rawCnpj) return;

      const legalName = cells[0];
      const kind = cells.length >= 3 ? cells[cells.length - 1] : '';
      rows.push({ label: kind || legalName, rawCnpj });
    });

    return { rows, pageLinks: [] };
  }
}
