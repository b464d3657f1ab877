import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { timingSafeEqual } from 'crypto';
import { IS_PUBLIC_KEY } from './public.decorator';

interface ApiRequest {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
}

/**
 * Guard que valida el header x-api-key contra la variable API_KEY.
 *
 * Todos los endpoints son protegidos por defecto.
 * Usa @Public() para excluir un endpoint (ej: healthcheck).
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: Buffer;

  constructor(
    private readonly config: ConfigService,
    private readonly reflector: Reflector,
  ) {
    this.apiKey = Buffer.from(this.config.get<string>('scraper.apiKey', ''));
    if (this.apiKey.length === 0) {
      this.logger.warn('⚠️  API_KEY no configurada; todos los requests serán rechazados.');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context.switchToHttp().getRequest<ApiRequest>();
    const header = request.headers['x-api-key'];
    const key = Array.isArray(header) ? header[0] : header;

    if (this.apiKey.length === 0) {
      throw new UnauthorizedException('API_KEY no configurada en el servidor');
    }

    if (!key) {
      throw new UnauthorizedException('Header x-api-key requerido');
    }

    const provided = Buffer.from(key);
    if (provided.length !== this.apiKey.length || !timingSafeEqual(provided, this.apiKey)) {
      this.logger.warn(`🚫 API Key inválida desde ${request.ip ?? 'desconocido'}`);
      throw new UnauthorizedException('API Key inválida');
    }

    return true;
  }
}
