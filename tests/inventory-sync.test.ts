import { describe, it, expect } from 'vitest';
import { InventorySync } from '../src/inventory-sync.class.js';
import { InventoryData } from '../src/inventory/inventory-data.class.js';
import { ConfigurationError, InventoryDataError, TagLookupError } from '../src/errors.js';
import type { InventorySyncOptions } from '../src/types/config.types.js';
import type { CloudSigmaSnapshot } from '../src/types/cloudsigma.types.js';
import { MockCloudSigmaApi, recordingFactory, server, tag } from './mocks/mock-cloudsigma-api.class.js';

function syncOptions(overrides: Partial<InventorySyncOptions> = {}): InventorySyncOptions {
  return {
    region: 'zrh',
    username: 'user@example.com',
    password: 'test-secret',
    includeRunningOnly: true,
    strict: false,
    compose: {},
    groups: {},
    keyedGroups: [],
    leadingSeparator: true,
    transformInvalidGroupChars: 'never',
    ...overrides,
  };
}

function fleet(): CloudSigmaSnapshot {
  return {
    tags: [
      tag('t-web', 'role_web'),
      tag('t-db', 'role_db'),
      tag('t-bastion', 'role_bastion'),
      tag('t-prod', 'env_prod'),
      tag('t-legacy', 'legacy'),
    ],
    servers: [
      server({ name: 'web1', tags: ['t-web', 't-prod'], ip: '10.0.0.1', meta: { owner: 'ops' } }),
      server({ name: 'db1', tags: ['t-db', 't-prod'], ip: '10.0.0.2' }),
      server({ name: 'old1', tags: ['t-web', 't-legacy'], ip: '10.0.0.3' }),
      server({ name: 'stopped1', status: 'stopped', tags: ['t-web'] }),
      server({ name: 'plain1' }),
    ],
  };
}

async function runSync(options: Partial<InventorySyncOptions>, snapshot: CloudSigmaSnapshot = fleet()) {
  const api = new MockCloudSigmaApi(snapshot);
  const { factory, created } = recordingFactory(api);
  const sync = new InventorySync(syncOptions(options), { createClient: factory });
  const inventory = new InventoryData();
  const report = await sync.run(inventory);
  return { api, created, inventory, report };
}

describe('InventorySync', () => {
  describe('region', () => {
    it('should create the client for the resolved endpoint and credentials', async () => {
      const { created, api } = await runSync({ region: 'FRA' });

      expect(created).toHaveLength(1);
      expect(created[0]?.region.endpoint).toBe('https://fra.cloudsigma.com/api/2.0/');
      expect(created[0]?.credentials).toEqual({ username: 'user@example.com', password: 'test-secret' });
      expect(api.calls).toEqual(['listTags', 'listServersDetail']);
    });

    it('should fail on an unsupported region before any API call', async () => {
      const api = new MockCloudSigmaApi(fleet());
      const { factory, created } = recordingFactory(api);
      const sync = new InventorySync(syncOptions({ region: 'mars' }), { createClient: factory });
      const inventory = new InventoryData();

      await expect(sync.run(inventory)).rejects.toThrow(ConfigurationError);
      await expect(sync.run(inventory)).rejects.toThrow('Invalid region: mars');
      expect(created).toHaveLength(0);
      expect(api.calls).toEqual([]);
      expect(inventory.hosts.size).toBe(0);
    });

    it('should report the region and endpoint', async () => {
      const { report } = await runSync({});
      expect(report.region).toBe('zrh');
      expect(report.endpoint).toBe('https://zrh.cloudsigma.com/api/2.0/');
      expect(report.serversFetched).toBe(5);
      expect(report.tagsFetched).toBe(5);
    });
  });

  describe('filters', () => {
    it('should keep only running servers by default', async () => {
      const { report, inventory } = await runSync({});
      expect(report.hostsAdded).toEqual(['web1', 'db1', 'old1', 'plain1']);
      expect(report.skipped.not_running).toEqual(['stopped1']);
      expect(inventory.hosts.has('stopped1')).toBe(false);
    });

    it('should keep stopped servers when include_running_only is off', async () => {
      const { report } = await runSync({ includeRunningOnly: false });
      expect(report.hostsAdded).toEqual(['web1', 'db1', 'old1', 'stopped1', 'plain1']);
    });

    it('should apply running, include and exclude filters in that order', async () => {
      const { report } = await runSync({ includeTags: ['role_web'], excludeTags: ['legacy'] });

      expect(report.hostsAdded).toEqual(['web1']);
      expect(report.skipped).toEqual({
        not_running: ['stopped1'],
        not_included: ['db1', 'plain1'],
        excluded: ['old1'],
      });
    });

    it('should exclude every server for an empty include list', async () => {
      const { report } = await runSync({ includeTags: [] });
      expect(report.hostsAdded).toEqual([]);
      expect(report.skipped.not_included).toEqual(['web1', 'db1', 'old1', 'plain1']);
    });

    it('should compare whole tag names', async () => {
      const { report } = await runSync({ excludeTags: ['role'] });
      expect(report.skipped.excluded).toEqual([]);
    });
  });

  describe('tag groups', () => {
    it('should group a role_web server into web', async () => {
      const { inventory, report } = await runSync({ groupTagPrefix: 'role_' }, {
        tags: [tag('t1', 'role_web')],
        servers: [server({ name: 'a', tags: ['t1'] })],
      });

      expect(report.groupsCreated).toEqual(['web']);
      expect(inventory.getHostGroups('a')).toEqual(['web']);
      expect(inventory.getHostVars('a')).toEqual({
        public_ip_address: null,
        tags: ['role_web'],
        server_name: 'a',
      });
    });

    it('should only derive groups from tags carrying the prefix', async () => {
      const { inventory } = await runSync({ groupTagPrefix: 'role_' }, {
        tags: [tag('t-bastion', 'role_bastion'), tag('t-prod', 'env_prod')],
        servers: [server({ name: 'jump', tags: ['t-bastion', 't-prod'] })],
      });

      expect(inventory.getHostGroups('jump')).toEqual(['bastion']);
      expect(inventory.groups.has('env_prod')).toBe(false);
      expect(inventory.groups.has('prod')).toBe(false);
    });

    it('should put a host without a prefixed tag in the default group only', async () => {
      const { inventory } = await runSync({ groupTagPrefix: 'role_' });
      expect(inventory.getHostGroups('plain1')).toEqual(['ungrouped']);
      expect(inventory.toListing().ungrouped).toEqual({ hosts: ['plain1'] });
    });

    it('should add a host to every group its prefixed tags name', async () => {
      const { inventory } = await runSync({ groupTagPrefix: 'role_' }, {
        tags: [tag('t-web', 'role_web'), tag('t-db', 'role_db')],
        servers: [server({ name: 'both', tags: ['t-web', 't-db'] })],
      });
      expect(inventory.getHostGroups('both')).toEqual(['web', 'db']);
    });

    it('should create groups for prefixed tags that no kept server uses', async () => {
      const { inventory, report } = await runSync({ groupTagPrefix: 'role_' });
      expect(report.groupsCreated).toEqual(['web', 'db', 'bastion']);
      expect(inventory.toListing().bastion).toEqual({});
    });

    it('should derive no groups without a prefix', async () => {
      const { inventory, report } = await runSync({});
      expect(report.groupsCreated).toEqual([]);
      expect([...inventory.groups.keys()]).toEqual(['all', 'ungrouped']);
      expect(inventory.getHostGroups('web1')).toEqual(['ungrouped']);
    });

    it('should fail on a prefix equal to a whole tag name', async () => {
      await expect(runSync({ groupTagPrefix: 'legacy' })).rejects.toThrow(InventoryDataError);
    });
  });

  describe('host variables', () => {
    it('should set the address, tags and server name', async () => {
      const { inventory } = await runSync({});
      expect(inventory.getHostVars('db1')).toEqual({
        public_ip_address: '10.0.0.2',
        tags: ['role_db', 'env_prod'],
        server_name: 'db1',
      });
    });

    it('should set meta only when the server has metadata', async () => {
      const { inventory } = await runSync({});
      expect(inventory.getHostVars('web1')).toHaveProperty('meta', { owner: 'ops' });
      expect(inventory.getHostVars('db1')).not.toHaveProperty('meta');
    });

    it('should set a null address when the first NIC has no runtime', async () => {
      const snapshot: CloudSigmaSnapshot = {
        tags: [],
        servers: [
          { ...server({ name: 'offline' }), nics: [{ runtime: null }] },
          { ...server({ name: 'private' }), nics: [{ runtime: { ip_v4: null } }] },
        ],
      };
      const { inventory } = await runSync({}, snapshot);
      expect(inventory.getHostVars('offline')).toHaveProperty('public_ip_address', null);
      expect(inventory.getHostVars('private')).toHaveProperty('public_ip_address', null);
    });

    it('should raise a tag lookup error for a tag missing from the tag list', async () => {
      const snapshot: CloudSigmaSnapshot = {
        tags: [],
        servers: [server({ name: 'a', tags: ['t-gone'] })],
      };

      const error = await runSync({}, snapshot).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(TagLookupError);
      if (error instanceof TagLookupError) {
        expect(error.message).toBe('Tag t-gone of server a is not in the tag list');
        expect(error.tagUuid).toBe('t-gone');
      }
    });
  });

  describe('constructed options', () => {
    it('should compose variables and groups from the host variables', async () => {
      const { inventory } = await runSync({
        groupTagPrefix: 'role_',
        compose: { ansible_host: 'public_ip_address' },
        groups: { production: "'env_prod' in tags" },
        keyedGroups: [{ key: 'meta', prefix: 'meta' }],
      });

      expect(inventory.getHostVars('web1')).toMatchObject({ ansible_host: '10.0.0.1' });
      expect(inventory.getHostGroups('web1')).toEqual(['web', 'production', 'meta_owner_ops']);
      expect(inventory.getHostGroups('db1')).toEqual(['db', 'production']);
    });
  });

  describe('snapshots', () => {
    it('should apply a given snapshot without calling the API', async () => {
      const api = new MockCloudSigmaApi();
      const { factory, created } = recordingFactory(api);
      const sync = new InventorySync(syncOptions({ groupTagPrefix: 'role_' }), { createClient: factory });
      const inventory = new InventoryData();

      const report = await sync.run(inventory, { snapshot: fleet() });

      expect(created).toHaveLength(0);
      expect(report.hostsAdded).toEqual(['web1', 'db1', 'old1', 'plain1']);
    });

    it('should be idempotent across runs', async () => {
      const options = syncOptions({ groupTagPrefix: 'role_', keyedGroups: [{ key: 'tags', prefix: 'tag' }] });
      const api = new MockCloudSigmaApi(fleet());
      const sync = new InventorySync(options, { createClient: recordingFactory(api).factory });

      const first = new InventoryData();
      const second = new InventoryData();
      const firstReport = await sync.run(first);
      const secondReport = await sync.run(second);

      expect(second.toListing()).toEqual(first.toListing());
      expect(secondReport).toEqual(firstReport);
    });
  });
});
