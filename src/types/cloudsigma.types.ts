/**
 * CloudSigma API 2.0 payloads, reduced to the fields the inventory reads.
 *
 * @see https://docs.cloudsigma.com/en/latest/servers.html
 * @see https://docs.cloudsigma.com/en/latest/tags.html
 */

export interface CloudSigmaResourceRef {
  uuid: string;
  resource_uri?: string;
}

export interface CloudSigmaTag {
  uuid: string;
  name: string;
  meta?: Record<string, string>;
  resources?: CloudSigmaResourceRef[];
  [key: string]: unknown;
}

export interface CloudSigmaNicRuntime {
  ip_v4?: { uuid: string; [key: string]: unknown } | null;
  interface_type?: string;
  [key: string]: unknown;
}

export interface CloudSigmaNic {
  mac?: string;
  model?: string;
  runtime?: CloudSigmaNicRuntime | null;
  [key: string]: unknown;
}

export type CloudSigmaServerStatus =
  | 'running'
  | 'stopped'
  | 'starting'
  | 'stopping'
  | 'paused'
  | 'unavailable'
  | (string & {});

export interface CloudSigmaServer {
  uuid: string;
  name: string;
  status: CloudSigmaServerStatus;
  tags: CloudSigmaResourceRef[];
  nics: CloudSigmaNic[];
  meta: Record<string, string>;
  [key: string]: unknown;
}

export interface CloudSigmaListResponse<T> {
  meta?: { limit?: number; offset?: number; total_count?: number };
  objects: T[];
}

/** Everything one inventory run needs from the API. Also the cached payload. */
export interface CloudSigmaSnapshot {
  tags: CloudSigmaTag[];
  servers: CloudSigmaServer[];
}
