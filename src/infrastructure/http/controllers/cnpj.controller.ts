import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import { BranchCrawlerService } from '../../../application/services/branch-crawler.service';
import { CompanyBatchService } from '../../../application/services/company-batch.service';
import { LayeredResolverService } from '../../../application/services/layered-resolver.service';
import { PROXY_POOL, ProxyPool } from '../../../domain/entities/proxy-pool.entity';
import { ResolutionResult } from '../../../domain/entities/resolution-result.entity';
import { InvalidInputError } from '../../../domain/errors/resolution.errors';
import { extractDigits, formatCnpj, validateCnpj } from '../../../shared/utils/cnpj';
import { InMemoryResultSink } from '../../adapters/sinks/in-memory-result.sink';
import { BatchResolveDto } from '../dtos/batch-resolve.dto';
import { BranchQueryDto } from '../dtos/branch-query.dto';
import {
  BatchResponseDto,
  BranchCrawlResponseDto,
  ResolutionResponseDto,
  ValidateCnpjResponseDto,
} from '../dtos/cnpj-response.dto';
import { ResolveCompanyDto } from '../dtos/resolve-company.dto';
import { ValidateCnpjDto } from '../dtos/validate-cnpj.dto';

@ApiTags('CNPJ')
@ApiSecurity('x-api-key')
@Controller('cnpj')
export class CnpjController {
  private readonly logger = new Logger(CnpjController.name);

  constructor(
    private readonly resolver: LayeredResolverService,
    private readonly crawler: BranchCrawlerService,
    private readonly batch: CompanyBatchService,
    @Inject(PROXY_POOL) private readonly proxyPool: ProxyPool,
  ) {}

  /**
   * GET /cnpj/resolve?q=NATURA
   *
   * CNPJ principal de una empresa (web propia → Wikipedia → Google).
   */
  @Get('resolve')
  @ApiOperation({
    summary: 'Resolver el CNPJ principal de una empresa',
    description:
      'Prueba las capas en orden de prioridad y se detiene en la primera que encuentra un CNPJ válido. ' +
      'El campo "trail" explica qué capas se probaron y por qué fallaron.',
  })
  @ApiResponse({ status: 200, type: ResolutionResponseDto })
  async resolve(@Query() dto: ResolveCompanyDto): Promise<ResolutionResponseDto> {
    this.logger.log(`🔍 Resolve: "${dto.q}"`);
    const result = await this.resolver.resolve(dto.q);
    return this.mapResult(result);
  }

  /**
   * GET /cnpj/branches?name=NATURA&cnpj=11.222.333/0001-81
   */
  @Get('branches')
  @ApiOperation({
    summary: 'Enumerar filiales de un CNPJ',
    description: 'Recorre todas las páginas del directorio de filiales con rotación de proxies.',
  })
  @ApiResponse({ status: 200, type: BranchCrawlResponseDto })
  @ApiResponse({ status: 400, description: 'Nombre inutilizable o CNPJ con checksum inválido' })
  async branches(@Query() dto: BranchQueryDto): Promise<BranchCrawlResponseDto> {
    this.logger.log(`🏢 Filiales: "${dto.name}" (${dto.cnpj})`);
    try {
      return await this.crawler.crawl(dto.name, dto.cnpj);
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  /**
   * POST /cnpj/batch
   *
   * Resolución por lote (hasta 50 empresas), opcionalmente con filiales.
   */
  @Post('batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Resolución por lote',
    description: 'Resuelve hasta 50 empresas con un pool acotado de workers y devuelve las filas resultantes.',
  })
  @ApiResponse({ status: 200, type: BatchResponseDto })
  async batchResolve(@Body() dto: BatchResolveDto): Promise<BatchResponseDto> {
    this.logger.log(`📦 Batch: ${dto.companies.length} empresas | filiales: ${dto.includeBranches ? 'sí' : 'no'}`);

    const sink = new InMemoryResultSink();
    const summary = await this.batch.run(
      dto.companies,
      { includeBranches: dto.includeBranches ?? false, concurrency: dto.concurrency },
      sink,
    );

    return { ...summary, rows: sink.getRows() };
  }

  /**
   * GET /cnpj/validate?cnpj=11.222.333/0001-81
   */
  @Get('validate')
  @ApiOperation({ summary: 'Validar y formatear un CNPJ (checksum módulo 11)' })
  @ApiResponse({ status: 200, type: ValidateCnpjResponseDto })
  validate(@Query() dto: ValidateCnpjDto): ValidateCnpjResponseDto {
    return {
      input: dto.cnpj,
      valid: validateCnpj(dto.cnpj),
      digits: extractDigits(dto.cnpj),
      formatted: formatCnpj(dto.cnpj),
    };
  }

  /**
   * GET /cnpj/health
   */
  @Public()
  @Get('health')
  @ApiOperation({ summary: 'Healthcheck (público, no requiere API key)' })
  health() {
    return {
      status: 'ok',
      uptime: process.uptime(),
      layers: this.resolver.priority,
      proxies: {
        mode: this.proxyPool.isDirect ? 'direct' : 'rotating',
        size: this.proxyPool.size,
        rotations: this.proxyPool.rotations,
        sample: this.proxyPool.sample(),
      },
    };
  }

  // ──────────────────────────────────────────────────────────
  // Helpers
  // ──────────────────────────────────────────────────────────

  private mapResult(result: ResolutionResult): ResolutionResponseDto {
    return {
      company: result.company,
      cnpj: result.cnpj,
      status: result.status,
      layer: result.layer,
      sourceUrl: result.sourceUrl,
      candidates: result.candidates,
      headOfficeConfirmed: result.headOfficeConfirmed,
      notes: result.notes,
      trail: result.trail,
      timestamp: result.timestamp.toISOString(),
    };
  }
}
