export { DiscoveryLayer, DEFAULT_LAYER_PRIORITY, isDiscoveryLayer } from './enums/discovery-layer.enum';
export { BranchDirectorySource, isBranchDirectorySource } from './enums/branch-directory-source.enum';
export { ResolutionStatus } from './enums/resolution-status.enum';
export { FetchStatus } from './enums/fetch-status.enum';
export {
  FailureKind,
  ResolutionError,
  InvalidInputError,
  SourceUnavailableError,
  FatalResolutionError,
  OperationCancelledError,
  throwIfCancelled,
} from './errors/resolution.errors';
export { Cnpj } from './entities/cnpj.entity';
export { ProxyPool, PROXY_POOL } from './entities/proxy-pool.entity';
export type { ProxyEndpoint } from './entities/proxy-pool.entity';
export { RetryPolicy } from './entities/retry-policy.entity';
export type { RetryPolicyOptions, DelayRange, FetchClassification } from './entities/retry-policy.entity';
export type { PageFetchOutcome, FetchResult } from './entities/page-fetch-outcome.entity';
export type { BranchEntry, BranchCrawlResult } from './entities/branch-entry.entity';
export { ResolutionResult } from './entities/resolution-result.entity';
export { layerHit, layerMiss } from './entities/layer-outcome.entity';
export type { LayerOutcome } from './entities/layer-outcome.entity';
export { CLOCK } from './ports/clock.port';
export type { ClockPort } from './ports/clock.port';
export { HTTP_TRANSPORT, TransportError } from './ports/http-transport.port';
export type { HttpTransportPort, HttpRequest, HttpResponse } from './ports/http-transport.port';
export { PAGE_FETCHER_PORT } from './ports/page-fetcher.port';
export type { PageFetcherPort } from './ports/page-fetcher.port';
export { BRANCH_DIRECTORY_PORT } from './ports/branch-directory.port';
export type { BranchDirectoryPort, BranchDirectoryPage, RawBranchRow } from './ports/branch-directory.port';
export { DISCOVERY_LAYERS } from './ports/discovery-layer.port';
export type { DiscoveryLayerPort } from './ports/discovery-layer.port';
export { COMPANY_REGISTRY_PORT } from './ports/company-registry.port';
export type { CompanyRegistryPort, RegistryRecord } from './ports/company-registry.port';
export type { ResultSinkPort, PrimaryResultRecord } from './ports/result-sink.port';
