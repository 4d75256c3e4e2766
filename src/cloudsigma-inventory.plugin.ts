import { InventoryConfig, PLUGIN_NAME, type ConfigEnvironment } from './config/inventory-config.class.js';
import { InventorySync, type CloudSigmaApiFactory, type SyncReport } from './inventory-sync.class.js';
import { resolveRegion } from './regions.js';
import { Cache, MemoryCache } from './cache/cache.class.js';
import { FilesystemCache } from './cache/filesystem-cache.class.js';
import { getGlobalLogger, type Logger } from './concerns/logger.js';
import type { ExpressionEvaluator } from './constructed/template-engine.js';
import type { InventorySink } from './inventory/inventory-data.class.js';
import type { CloudSigmaSnapshot } from './types/cloudsigma.types.js';

export interface CloudSigmaInventoryPluginOptions {
  createClient?: CloudSigmaApiFactory;
  evaluator?: ExpressionEvaluator;
  logger?: Logger;
  env?: ConfigEnvironment;
}

export interface ParseOptions {
  /** When false the API is queried and the cache, if enabled, is refreshed. */
  cache?: boolean;
}

export interface ParseResult extends SyncReport {
  source: string;
  fromCache: boolean;
}

function isSnapshot(value: unknown): value is CloudSigmaSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  return 'tags' in value && Array.isArray(value.tags)
    && 'servers' in value && Array.isArray(value.servers);
}

/**
 * Inventory source plugin for CloudSigma: recognises `*cloudsigma.yml`
 * sources and populates an inventory from the account's servers.
 */
export class CloudSigmaInventoryPlugin {
  static readonly NAME = PLUGIN_NAME;

  createClient?: CloudSigmaApiFactory;
  evaluator?: ExpressionEvaluator;
  env: ConfigEnvironment;
  private _logger: Logger;
  private _caches: Map<string, Cache>;

  constructor(options: CloudSigmaInventoryPluginOptions = {}) {
    this.createClient = options.createClient;
    this.evaluator = options.evaluator;
    this.env = options.env ?? process.env;
    this._logger = (options.logger ?? getGlobalLogger()).child({ plugin: PLUGIN_NAME });
    this._caches = new Map();
  }

  async verifyFile(path: string): Promise<boolean> {
    return InventoryConfig.verifyFile(path);
  }

  async readConfig(path: string): Promise<InventoryConfig> {
    return InventoryConfig.load(path, this.env);
  }

  getCache(config: InventoryConfig): Cache {
    const { cache_plugin, cache_connection, cache_prefix, cache_timeout } = config.source;
    const id = [cache_plugin, cache_connection ?? '', cache_prefix, cache_timeout].join('|');

    let cache = this._caches.get(id);
    if (!cache) {
      const ttl = cache_timeout * 1000;
      cache = cache_plugin === 'jsonfile' && cache_connection
        ? new FilesystemCache({ directory: cache_connection, prefix: cache_prefix, ttl })
        : new MemoryCache({ ttl });
      this._caches.set(id, cache);
    }
    return cache;
  }

  async parse(inventory: InventorySink, path: string, options: ParseOptions = {}): Promise<ParseResult> {
    const useCache = options.cache ?? true;
    const config = await this.readConfig(path);
    const syncOptions = config.toSyncOptions();

    // Fail on the region before the cache or the API is touched.
    resolveRegion(syncOptions.region);

    const sync = new InventorySync(syncOptions, {
      createClient: this.createClient,
      evaluator: this.evaluator,
      logger: this._logger,
    });

    let snapshot: CloudSigmaSnapshot | undefined;
    let fromCache = false;

    if (config.source.cache) {
      const cache = this.getCache(config);
      const key = config.cacheKey;

      if (useCache) {
        const cached = await cache.get(key);
        if (isSnapshot(cached)) {
          snapshot = cached;
          fromCache = true;
          this._logger.debug({ key }, 'using cached CloudSigma inventory');
        }
      }

      if (!snapshot) {
        snapshot = await sync.fetchSnapshot();
        await cache.set(key, snapshot);
      }
    }

    const report = await sync.run(inventory, { snapshot });
    return { ...report, source: path, fromCache };
  }
}

export default CloudSigmaInventoryPlugin;
