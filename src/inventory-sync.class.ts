import { TagLookupError } from './errors.js';
import { resolveRegion, type CloudSigmaRegion } from './regions.js';
import { getGlobalLogger, type Logger } from './concerns/logger.js';
import { CloudSigmaClient, type CloudSigmaApi } from './clients/cloudsigma-client.class.js';
import { Constructable } from './constructed/constructable.class.js';
import { TemplateEngine, type ExpressionEvaluator } from './constructed/template-engine.js';
import type { HostVars, InventorySink } from './inventory/inventory-data.class.js';
import type { CloudSigmaServer, CloudSigmaSnapshot, CloudSigmaTag } from './types/cloudsigma.types.js';
import type { InventorySyncOptions } from './types/config.types.js';

export interface CloudSigmaCredentials {
  username: string;
  password: string;
}

export type CloudSigmaApiFactory = (region: CloudSigmaRegion, credentials: CloudSigmaCredentials) => CloudSigmaApi;

export type SkipReason = 'not_running' | 'not_included' | 'excluded';

export interface SyncReport {
  region: string;
  endpoint: string;
  serversFetched: number;
  tagsFetched: number;
  hostsAdded: string[];
  skipped: Record<SkipReason, string[]>;
  groupsCreated: string[];
}

export interface InventorySyncDependencies {
  /** Builds the API client once the region has been resolved. */
  createClient?: CloudSigmaApiFactory;
  evaluator?: ExpressionEvaluator;
  logger?: Logger;
}

export interface SyncRunOptions {
  /** Use this payload instead of calling the API, e.g. a cache hit. */
  snapshot?: CloudSigmaSnapshot;
}

export const defaultClientFactory: CloudSigmaApiFactory = (region, credentials) =>
  new CloudSigmaClient({ endpoint: region.endpoint, ...credentials });

/**
 * One inventory run: list tags and servers, filter the servers, derive groups
 * from prefixed tag names, and write host variables into the sink.
 */
export class InventorySync {
  options: InventorySyncOptions;
  createClient: CloudSigmaApiFactory;
  evaluator: ExpressionEvaluator;
  private _logger: Logger;

  constructor(options: InventorySyncOptions, dependencies: InventorySyncDependencies = {}) {
    this.options = options;
    this.createClient = dependencies.createClient ?? defaultClientFactory;
    this.evaluator = dependencies.evaluator ?? new TemplateEngine();
    this._logger = (dependencies.logger ?? getGlobalLogger()).child({ component: 'inventory-sync' });
  }

  /** Resolves the region and downloads tags, then servers. */
  async fetchSnapshot(): Promise<CloudSigmaSnapshot> {
    const region = resolveRegion(this.options.region);
    const client = this.createClient(region, {
      username: this.options.username,
      password: this.options.password,
    });

    const tags = await client.listTags();
    const servers = await client.listServersDetail();
    this._logger.info({ region: region.code, tags: tags.length, servers: servers.length }, 'fetched CloudSigma inventory');
    return { tags, servers };
  }

  async run(inventory: InventorySink, runOptions: SyncRunOptions = {}): Promise<SyncReport> {
    const region = resolveRegion(this.options.region);
    const snapshot = runOptions.snapshot ?? await this.fetchSnapshot();
    return this.apply(inventory, snapshot, region);
  }

  /** The in-memory pass over an already fetched snapshot. */
  apply(inventory: InventorySink, snapshot: CloudSigmaSnapshot, region: CloudSigmaRegion = resolveRegion(this.options.region)): SyncReport {
    const {
      groupTagPrefix,
      includeRunningOnly,
      includeTags,
      excludeTags,
    } = this.options;

    const report: SyncReport = {
      region: region.code,
      endpoint: region.endpoint,
      serversFetched: snapshot.servers.length,
      tagsFetched: snapshot.tags.length,
      hostsAdded: [],
      skipped: { not_running: [], not_included: [], excluded: [] },
      groupsCreated: [],
    };

    const tagsByUuid = new Map<string, CloudSigmaTag>(snapshot.tags.map(tag => [tag.uuid, tag]));

    if (groupTagPrefix !== undefined) {
      for (const tag of snapshot.tags) {
        if (tag.name.startsWith(groupTagPrefix)) {
          const group = inventory.addGroup(tag.name.slice(groupTagPrefix.length));
          if (!report.groupsCreated.includes(group)) report.groupsCreated.push(group);
        }
      }
    }

    const constructable = new Constructable({
      inventory,
      evaluator: this.evaluator,
      leadingSeparator: this.options.leadingSeparator,
      transformInvalidGroupChars: this.options.transformInvalidGroupChars,
      logger: this._logger,
    });

    for (const server of snapshot.servers) {
      const hostname = server.name;

      if (includeRunningOnly && server.status !== 'running') {
        report.skipped.not_running.push(hostname);
        continue;
      }

      const tagNames = this._serverTagNames(server, tagsByUuid);

      if (includeTags !== undefined && !tagNames.some(tag => includeTags.includes(tag))) {
        report.skipped.not_included.push(hostname);
        continue;
      }

      if (excludeTags !== undefined && tagNames.some(tag => excludeTags.includes(tag))) {
        report.skipped.excluded.push(hostname);
        continue;
      }

      let groupAssigned = false;
      if (groupTagPrefix !== undefined) {
        for (const tagName of tagNames) {
          if (tagName.startsWith(groupTagPrefix)) {
            inventory.addHost(hostname, tagName.slice(groupTagPrefix.length));
            groupAssigned = true;
          }
        }
      }
      if (!groupAssigned) {
        inventory.addHost(hostname);
      }

      const hostVars = this._hostVars(server, tagNames);
      for (const [name, value] of Object.entries(hostVars)) {
        inventory.setVariable(hostname, name, value);
      }

      constructable.construct(hostname, hostVars, this.options);
      report.hostsAdded.push(hostname);
    }

    this._logger.info({
      hosts: report.hostsAdded.length,
      skipped: Object.values(report.skipped).reduce((total, names) => total + names.length, 0),
      groups: report.groupsCreated.length,
    }, 'inventory populated');

    return report;
  }

  private _serverTagNames(server: CloudSigmaServer, tagsByUuid: Map<string, CloudSigmaTag>): string[] {
    return (server.tags ?? []).map(ref => {
      const tag = tagsByUuid.get(ref.uuid);
      if (!tag) {
        throw new TagLookupError(`Tag ${ref.uuid} of server ${server.name} is not in the tag list`, {
          tagUuid: ref.uuid,
          serverName: server.name,
        });
      }
      return tag.name;
    });
  }

  private _hostVars(server: CloudSigmaServer, tagNames: string[]): HostVars {
    const hostVars: HostVars = {
      public_ip_address: server.nics?.[0]?.runtime?.ip_v4?.uuid ?? null,
      tags: tagNames,
      server_name: server.name,
    };

    if (server.meta && Object.keys(server.meta).length > 0) {
      hostVars.meta = server.meta;
    }

    if (hostVars.public_ip_address === null) {
      this._logger.debug({ host: server.name }, 'server has no runtime IPv4 address on its first NIC');
    }

    return hostVars;
  }
}

export default InventorySync;
