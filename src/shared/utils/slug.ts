/**
 * Normalización de nombres de empresa brasileños a slugs.
 *
 * "Embraer S.A."         → "embraer-sa"     (slug de directorio)
 * "Raízen S.A."          → "raizen-sa"
 * "Mercado Livre Ltda."  → "mercado-livre-ltda"
 * "Embraer S.A."         → "embraer"        (slug de dominio)
 */

/** Quita acentos (NFKD) y cualquier carácter fuera de ASCII. */
export function stripDiacritics(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\x00-\x7f]/g, '');
}

/**
 * Slug usado por el directorio de filiales en sus URLs.
 * Vacío si el nombre no tiene ningún carácter aprovechable.
 */
export function normalizeSlug(companyName: string): string {
  let text = stripDiacritics(companyName.toLowerCase());

  // "s.a.", "s a", "sa." → "sa"
  text = text.replace(/\bs\.?\s*a\.?\b/g, 'sa');
  // "ltda." → "ltda"
  text = text.replace(/\bltda\.?\b/g, 'ltda');

  text = text.replace(/[^\w\s-]/g, '');
  text = text.replace(/[\s_]+/g, '-');
  text = text.replace(/^-+|-+$/g, '');

  return text.replace(/-+/g, '-');
}

/** Sufijos legales/genéricos que no aparecen en el dominio de la empresa. */
const DOMAIN_NOISE_PATTERNS: RegExp[] = [
  /\bs\.?a\.?\b/g,
  /\bsa\b/g,
  /\bltda\.?\b/g,
  /\bme\b/g,
  /\bepp\b/g,
  /\bholding\b/g,
  /\bgrupo\b/g,
  /\bcia\.?\b/g,
  /\bcompanhia\b/g,
  /\bempresa\b/g,
  /\bs\.?a\.?s\.?\b/g,
];

/** Slug compacto para generar dominios: "Natura Cosméticos S.A." → "naturacosmeticos". */
export function toDomainSlug(companyName: string): string {
  let slug = stripDiacritics(companyName).toLowerCase();

  for (const pattern of DOMAIN_NOISE_PATTERNS) {
    slug = slug.replace(pattern, '');
  }

  return slug.replace(/[^a-z0-9\s]/g, '').replace(/\s+/g, '').trim();
}

/** Dominios candidatos de la web propia, en orden de prueba. */
export function generateDomainCandidates(companyName: string): string[] {
  const slug = toDomainSlug(companyName);
  if (!slug) return [];

  return [
    `${slug}.com.br`,
    `${slug}.com`,
    `${slug}.br`,
    `www.${slug}.com.br`,
    `www.${slug}.com`,
  ];
}
