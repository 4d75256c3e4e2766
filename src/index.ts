// =============================================================================
// Inventory
// =============================================================================

export { CloudSigmaInventoryPlugin, type CloudSigmaInventoryPluginOptions, type ParseOptions, type ParseResult } from './cloudsigma-inventory.plugin.js';
export {
  InventorySync,
  defaultClientFactory,
  type CloudSigmaApiFactory,
  type CloudSigmaCredentials,
  type InventorySyncDependencies,
  type SkipReason,
  type SyncReport,
  type SyncRunOptions,
} from './inventory-sync.class.js';
export {
  InventoryData,
  ALL_GROUP,
  UNGROUPED_GROUP,
  type HostVars,
  type InventoryGroup,
  type InventoryHost,
  type InventoryListing,
  type InventorySink,
  type ListedGroup,
} from './inventory/inventory-data.class.js';
export { Constructable, isTruthy, type ConstructableOptions } from './constructed/constructable.class.js';
export {
  TemplateEngine,
  type EvaluateOptions,
  type ExpressionEvaluator,
  type FilterFunction,
  type TemplateEngineOptions,
} from './constructed/template-engine.js';
export {
  InventoryConfig,
  CONFIG_DEFAULTS,
  PLUGIN_NAME,
  SOURCE_FILE_SUFFIXES,
  type ConfigEnvironment,
} from './config/inventory-config.class.js';
export {
  CLOUDSIGMA_REGIONS,
  REGION_CODES,
  isRegionCode,
  listRegions,
  resolveRegion,
  type CloudSigmaRegion,
  type CloudSigmaRegionCode,
} from './regions.js';

// =============================================================================
// Clients & Cache
// =============================================================================

export { CloudSigmaClient, type CloudSigmaApi, type CloudSigmaClientOptions } from './clients/cloudsigma-client.class.js';
export { Cache, MemoryCache, type CacheConfig, type CacheEntry, type CacheStats } from './cache/cache.class.js';
export { FilesystemCache, type FilesystemCacheConfig } from './cache/filesystem-cache.class.js';

// =============================================================================
// Errors, Concerns & Types
// =============================================================================

export * from './errors.js';
export * from './concerns/index.js';
export type * from './types/index.js';
