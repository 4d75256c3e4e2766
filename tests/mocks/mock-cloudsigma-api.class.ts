/**
 * MockCloudSigmaApi - in-process stand-in for the CloudSigma API
 *
 * - Serves a fixed snapshot of tags and servers
 * - Call tracking for assertions
 * - Error injection per operation
 */

import { cloneDeep } from 'lodash-es';
import type { CloudSigmaApi } from '../../src/clients/cloudsigma-client.class.js';
import type { CloudSigmaApiFactory, CloudSigmaCredentials } from '../../src/inventory-sync.class.js';
import type { CloudSigmaRegion } from '../../src/regions.js';
import type {
  CloudSigmaServer,
  CloudSigmaSnapshot,
  CloudSigmaTag,
} from '../../src/types/cloudsigma.types.js';

export type MockOperation = 'listTags' | 'listServersDetail';

export class MockCloudSigmaApi implements CloudSigmaApi {
  snapshot: CloudSigmaSnapshot;
  calls: MockOperation[];
  private _errors: Map<MockOperation, Error>;

  constructor(snapshot: CloudSigmaSnapshot = { tags: [], servers: [] }) {
    this.snapshot = snapshot;
    this.calls = [];
    this._errors = new Map();
  }

  mockError(operation: MockOperation, error: Error): this {
    this._errors.set(operation, error);
    return this;
  }

  async listTags(): Promise<CloudSigmaTag[]> {
    return this._serve('listTags', this.snapshot.tags);
  }

  async listServersDetail(): Promise<CloudSigmaServer[]> {
    return this._serve('listServersDetail', this.snapshot.servers);
  }

  private _serve<T>(operation: MockOperation, items: T[]): T[] {
    this.calls.push(operation);
    const error = this._errors.get(operation);
    if (error) throw error;
    return cloneDeep(items);
  }
}

export interface RecordedClient {
  region: CloudSigmaRegion;
  credentials: CloudSigmaCredentials;
  api: MockCloudSigmaApi;
}

/** A client factory that hands out `api` and records every call to it. */
export function recordingFactory(api: MockCloudSigmaApi): { factory: CloudSigmaApiFactory; created: RecordedClient[] } {
  const created: RecordedClient[] = [];
  const factory: CloudSigmaApiFactory = (region, credentials) => {
    created.push({ region, credentials, api });
    return api;
  };
  return { factory, created };
}

// ============================================
// Payload builders
// ============================================

export function tag(uuid: string, name: string): CloudSigmaTag {
  return { uuid, name };
}

export interface ServerFixture {
  name: string;
  status?: string;
  tags?: string[];
  ip?: string | null;
  meta?: Record<string, string>;
  uuid?: string;
}

export function server(fixture: ServerFixture): CloudSigmaServer {
  const { name, status = 'running', tags = [], ip = null, meta = {}, uuid = `srv-${name}` } = fixture;
  return {
    uuid,
    name,
    status,
    tags: tags.map(tagUuid => ({ uuid: tagUuid })),
    nics: ip === null ? [] : [{ runtime: { ip_v4: { uuid: ip } } }],
    meta,
  };
}
