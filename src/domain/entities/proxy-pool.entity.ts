import { FatalResolutionError } from '../errors/resolution.errors';

const SUPPORTED_PROTOCOLS = new Set([
  'http:',
  'https:',
  'socks:',
  'socks4:',
  'socks4a:',
  'socks5:',
  'socks5h:',
]);

/** Un proxy de la lista. `label` nunca incluye credenciales (seguro para logs). */
export interface ProxyEndpoint {
  url: string;
  protocol: string;
  label: string;
}

/**
 * Pool de proxies con rotación round-robin.
 *
 * La lista es inmutable durante toda la corrida; el cursor es el único estado
 * mutable y solo lo avanza `next()`. Como `next()` es síncrono, cada intento de
 * fetch avanza el cursor exactamente una vez aunque haya varios workers en paralelo,
 * así la rotación es global a la corrida y no por worker.
 */
export class ProxyPool {
  private readonly endpoints: readonly ProxyEndpoint[];
  private cursor = 0;

  constructor(proxyUrls: readonly string[]) {
    this.endpoints = Object.freeze(proxyUrls.map((raw) => ProxyPool.parseEndpoint(raw)));
  }

  /** Sin proxies → conexión directa */
  get isDirect(): boolean {
    return this.endpoints.length === 0;
  }

  get size(): number {
    return this.endpoints.length;
  }

  /** Cuántas veces se avanzó el cursor en total */
  get rotations(): number {
    return this.cursor;
  }

  /** Siguiente proxy (round-robin). null si el pool está vacío. */
  next(): ProxyEndpoint | null {
    if (this.endpoints.length === 0) return null;
    const endpoint = this.endpoints[this.cursor % this.endpoints.length];
    this.cursor++;
    return endpoint;
  }

  /** Etiquetas host:port de los primeros proxies (para /health) */
  sample(limit = 5): string[] {
    return this.endpoints.slice(0, limit).map((e) => e.label);
  }

  private static parseEndpoint(raw: string): ProxyEndpoint {
    let parsed: URL;
    try {
      parsed = new URL(raw.trim());
    } catch {
      throw new FatalResolutionError(`Proxy mal formado en la configuración: "${ProxyPool.mask(raw)}"`);
    }

    if (!SUPPORTED_PROTOCOLS.has(parsed.protocol) || !parsed.hostname) {
      throw new FatalResolutionError(
        `Protocolo de proxy no soportado (${parsed.protocol}) para ${parsed.host}`,
      );
    }

    return {
      url: parsed.href,
      protocol: parsed.protocol.replace(':', ''),
      label: parsed.host,
    };
  }

  /** Oculta user:pass de una cadena de proxy inválida antes de loguearla */
  private static mask(raw: string): string {
    return raw.replace(/\/\/[^@/]*@/, '//***@');
  }
}

/** Token de inyección del pool compartido (uno por proceso) */
export const PROXY_POOL = Symbol('PROXY_POOL');
