import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CnpjController } from './controllers/cnpj.controller';
import { BranchCrawlerService } from '../../application/services/branch-crawler.service';
import { CompanyBatchService } from '../../application/services/company-batch.service';
import { LayeredResolverService } from '../../application/services/layered-resolver.service';
import { PROXY_POOL, ProxyPool } from '../../domain/entities/proxy-pool.entity';
import { BranchDirectorySource } from '../../domain/enums/branch-directory-source.enum';
import { BRANCH_DIRECTORY_PORT, BranchDirectoryPort } from '../../domain/ports/branch-directory.port';
import { CLOCK } from '../../domain/ports/clock.port';
import { COMPANY_REGISTRY_PORT } from '../../domain/ports/company-registry.port';
import { DISCOVERY_LAYERS, DiscoveryLayerPort } from '../../domain/ports/discovery-layer.port';
import { HTTP_TRANSPORT } from '../../domain/ports/http-transport.port';
import { PAGE_FETCHER_PORT } from '../../domain/ports/page-fetcher.port';
import { AntiBlockingHttpClient } from '../adapters/anti-blocking-http.client';
import { CnpjBizDirectoryAdapter } from '../adapters/cnpj-biz-directory.adapter';
import { DiretorioBrasilDirectoryAdapter } from '../adapters/diretorio-brasil-directory.adapter';
import { EncyclopediaDiscoveryAdapter } from '../adapters/discovery/encyclopedia-discovery.adapter';
import { SearchEngineDiscoveryAdapter } from '../adapters/discovery/search-engine-discovery.adapter';
import { WebsiteDiscoveryAdapter } from '../adapters/discovery/website-discovery.adapter';
import { NodeHttpTransport } from '../adapters/node-http.transport';
import { PublicRegistryHttpAdapter } from '../adapters/public-registry-http.adapter';
import { SystemClock } from '../adapters/system-clock.adapter';
import { ScraperConfig } from '../../shared/config/scraper.config';

@Module({
  imports: [ConfigModule],
  controllers: [CnpjController],
  providers: [
    // Infraestructura base: reloj real y HTTP sobre módulos de Node
    { provide: CLOCK, useClass: SystemClock },
    { provide: HTTP_TRANSPORT, useClass: NodeHttpTransport },

    // Un único pool de proxies para todo el proceso (rotación global)
    {
      provide: PROXY_POOL,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new ProxyPool(config.getOrThrow<string[]>('scraper.proxies')),
    },

    // Cliente anti-bloqueo + directorio de filiales (el sitio lo elige la config)
    { provide: PAGE_FETCHER_PORT, useClass: AntiBlockingHttpClient },
    DiretorioBrasilDirectoryAdapter,
    CnpjBizDirectoryAdapter,
    {
      provide: BRANCH_DIRECTORY_PORT,
      inject: [ConfigService, DiretorioBrasilDirectoryAdapter, CnpjBizDirectoryAdapter],
      useFactory: (
        config: ConfigService,
        diretorioBrasil: DiretorioBrasilDirectoryAdapter,
        cnpjBiz: CnpjBizDirectoryAdapter,
      ): BranchDirectoryPort =>
        config.getOrThrow<ScraperConfig['directory']>('scraper.directory').source ===
        BranchDirectorySource.CNPJ_BIZ
          ? cnpjBiz
          : diretorioBrasil,
    },

    // Capas de descubrimiento (implementan DiscoveryLayerPort); el orden lo define la config
    WebsiteDiscoveryAdapter,
    EncyclopediaDiscoveryAdapter,
    SearchEngineDiscoveryAdapter,
    {
      provide: DISCOVERY_LAYERS,
      inject: [WebsiteDiscoveryAdapter, EncyclopediaDiscoveryAdapter, SearchEngineDiscoveryAdapter],
      useFactory: (...layers: DiscoveryLayerPort[]) => layers,
    },

    // Registro público para desambiguar la matriz
    { provide: COMPANY_REGISTRY_PORT, useClass: PublicRegistryHttpAdapter },

    // Servicios de aplicación
    LayeredResolverService,
    BranchCrawlerService,
    CompanyBatchService,
  ],
  exports: [LayeredResolverService, BranchCrawlerService, CompanyBatchService],
})
export class ResolverModule {}
