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
 * Adaptador diretoriobrasil.net: listado de filiales por CNPJ.
 *
 * URL semilla: /filiais/<slug>-<14 dígitos>.html
 * Cada fila es un `div.row-list` con la etiqueta en `h5.socio` y el CNPJ en `p.det`;
 * sin `h5.socio` la fila no es del listado y se ignora.
 * La paginación vive en `nav[aria-label="Resultado da busca"]` como links `?p=N`.
 */
@Injectable()
export class DiretorioBrasilDirectoryAdapter implements BranchDirectoryPort {
  readonly name = 'diretoriobrasil.net';
  readonly retryPolicy: RetryPolicy;
  private readonly baseUrl: string;

  constructor(private readonly config: ConfigService) {
    const http = this.config.getOrThrow<ScraperConfig['http']>('scraper.http');
    const directory = this.config.getOrThrow<ScraperConfig['directory']>('scraper.directory');

    this.baseUrl = directory.baseUrl.replace(/\/+$/, '');
    this.retryPolicy = new RetryPolicy({
      ...http,
      expectedMarkers: directory.expectedMarkers,
    });
  }

  buildSeedUrls(slug: string, cnpjDigits: string): string[] {
    return [`${this.baseUrl}/filiais/${slug}-${cnpjDigits}.html`];
  }

  parsePage(html: string, pageUrl: string): BranchDirectoryPage {
    const $ = cheerio.load(html);
    const rows: RawBranchRow[] = [];

    $('div.row-list').each((_, el) => {
      const row = $(el);
      const labelTag = row.find('h5.socio').first();
      if (labelTag.length === 0) return;

      const [rawCnpj] = extractCnpjCandidates(row.find('p.det').text());
      if (!rawCnpj) return;

      rows.push({ label: labelTag.text().replace(/\s+/g, ' ').trim(), rawCnpj });
    });

    const links = new Set<string>();
    $('nav[aria-label="Resultado da busca"] a[href]').each((_, el) => {
      const link = $(el);
      const href = link.attr('href') || '';
      if (!href.includes('?p=') || link.parent().hasClass('disabled')) return;

      try {
        links.add(new URL(href, pageUrl).href);
      } catch {
        // href roto: se ignora ese link
        return;
      }
    });

    return { rows, pageLinks: [...links].sort() };
  }
}
