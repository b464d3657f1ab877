import * as cheerio from 'cheerio';

const BLOCK_ELEMENTS = 'br, p, div, li, td, th, tr, h1, h2, h3, h4, h5, h6, span, a, footer, section, address';

/**
 * Texto visible de un HTML: sin script/style/noscript y con un espacio
 * después de cada bloque, para que dos CNPJs contiguos no se peguen.
 */
export function visibleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).append(' ');
  });
  return $.root().text().replace(/\s+/g, ' ').trim();
}
