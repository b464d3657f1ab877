import { Injectable } from '@nestjs/common';
import * as http from 'http';
import * as https from 'https';
import * as zlib from 'zlib';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { ProxyEndpoint } from '../../domain/entities/proxy-pool.entity';
import { FatalResolutionError } from '../../domain/errors/resolution.errors';
import {
  HttpRequest,
  HttpResponse,
  HttpTransportPort,
  TransportError,
} from '../../domain/ports/http-transport.port';

/**
 * Chrome-like TLS cipher suite para bypass Cloudflare JA3 fingerprinting
 */
const CHROME_CIPHERS = [
  'TLS_AES_128_GCM_SHA256',
  'TLS_AES_256_GCM_SHA384',
  'TLS_CHACHA20_POLY1305_SHA256',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
  'ECDHE-RSA-AES128-SHA',
  'ECDHE-RSA-AES256-SHA',
  'AES128-GCM-SHA256',
  'AES256-GCM-SHA384',
].join(':');

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * GET sobre los módulos http/https de Node.
 * Soporta proxies SOCKS (socks-proxy-agent) y HTTP CONNECT (https-proxy-agent),
 * descomprime gzip/deflate/br y decodifica latin1 cuando el servidor lo declara.
 */
@Injectable()
export class NodeHttpTransport implements HttpTransportPort {
  async get(request: HttpRequest): Promise<HttpResponse> {
    let current = this.parseUrl(request.url);
    const maxRedirects = request.maxRedirects ?? 0;

    for (let hop = 0; ; hop++) {
      const response = await this.send(current, request);
      const location = response.location;

      if (!REDIRECT_STATUSES.has(response.status) || !location || maxRedirects === 0) {
        return { status: response.status, body: response.body, url: current.href };
      }

      if (hop >= maxRedirects) {
        throw new TransportError(
          `Demasiadas redirecciones (${maxRedirects}) desde ${request.url}`,
          'TOO_MANY_REDIRECTS',
        );
      }

      current = this.parseUrl(location, current);
    }
  }

  // ──────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────

  private send(
    url: URL,
    request: HttpRequest,
  ): Promise<{ status: number; body: string; location: string | null }> {
    return new Promise((resolvePromise, rejectPromise) => {
      // plazo total del request: el timeout del socket solo mide inactividad
      let deadline: NodeJS.Timeout | undefined;
      const resolve = (value: { status: number; body: string; location: string | null }): void => {
        clearTimeout(deadline);
        resolvePromise(value);
      };
      const reject = (error: TransportError): void => {
        clearTimeout(deadline);
        rejectPromise(error);
      };

      const isHttps = url.protocol === 'https:';
      const agent = request.proxy ? this.makeAgent(request.proxy) : undefined;

      const options: https.RequestOptions = {
        method: 'GET',
        agent,
        headers: request.headers,
      };
      if (isHttps) {
        options.ciphers = CHROME_CIPHERS;
        options.minVersion = 'TLSv1.2';
        // proxies pueden presentar cert diferente
        options.rejectUnauthorized = !request.proxy;
      }

      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (err) => reject(new TransportError(err.message, 'NETWORK')));
        res.on('end', () => {
          try {
            const raw = this.decompress(Buffer.concat(chunks), res.headers['content-encoding']);
            resolve({
              status: res.statusCode ?? 0,
              body: this.decode(raw, res.headers['content-type']),
              location: res.headers.location ?? null,
            });
          } catch (err) {
            reject(new TransportError(`Cuerpo ilegible: ${this.describe(err)}`, 'NETWORK'));
          }
        });
      };

      const req = isHttps
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

      req.on('error', (err) => {
        reject(err instanceof TransportError ? err : new TransportError(err.message, 'NETWORK'));
      });
      req.setTimeout(request.timeoutMs, () => {
        req.destroy(new TransportError(`Timeout (${request.timeoutMs}ms) ${url.host}`, 'TIMEOUT'));
      });
      deadline = setTimeout(() => {
        reject(new TransportError(`Timeout total (${request.timeoutMs}ms) ${url.host}`, 'TIMEOUT'));
        req.destroy();
      }, request.timeoutMs);
      req.end();
    });
  }

  private makeAgent(proxy: ProxyEndpoint): http.Agent {
    if (proxy.protocol.startsWith('socks')) {
      return new SocksProxyAgent(proxy.url);
    }
    return new HttpsProxyAgent(proxy.url);
  }

  private decompress(buffer: Buffer, encoding: string | undefined): Buffer {
    switch ((encoding || '').trim().toLowerCase()) {
      case 'gzip':
        return zlib.gunzipSync(buffer);
      case 'deflate':
        return zlib.inflateSync(buffer);
      case 'br':
        return zlib.brotliDecompressSync(buffer);
      default:
        return buffer;
    }
  }

  private decode(buffer: Buffer, contentType: string | undefined): string {
    const charset = /charset=([^;]+)/i.exec(contentType || '')?.[1]?.trim().toLowerCase();
    if (charset === 'iso-8859-1' || charset === 'latin1' || charset === 'windows-1252') {
      return buffer.toString('latin1');
    }
    return buffer.toString('utf-8');
  }

  private parseUrl(value: string, base?: URL): URL {
    try {
      const url = new URL(value, base);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new FatalResolutionError(`Protocolo no soportado: ${url.protocol}`);
      }
      return url;
    } catch (err) {
      if (err instanceof FatalResolutionError) throw err;
      throw new FatalResolutionError(`URL inválida: "${value}"`);
    }
  }

  private describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  }
}
