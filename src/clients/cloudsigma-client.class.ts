import { CloudSigmaApiError } from '../errors.js';
import { createHttpClient, type HttpClient, type HttpClientOptions } from '../concerns/http-client.js';
import { getGlobalLogger, type Logger } from '../concerns/logger.js';
import type {
  CloudSigmaListResponse,
  CloudSigmaServer,
  CloudSigmaTag,
} from '../types/cloudsigma.types.js';

/** The two list calls an inventory run makes. */
export interface CloudSigmaApi {
  listTags(): Promise<CloudSigmaTag[]>;
  listServersDetail(): Promise<CloudSigmaServer[]>;
}

export interface CloudSigmaClientOptions {
  endpoint: string;
  username: string;
  password: string;
  timeout?: number;
  retry?: HttpClientOptions['retry'];
  http?: HttpClient;
  logger?: Logger;
}

function isListResponse(value: unknown): value is CloudSigmaListResponse<unknown> {
  return typeof value === 'object'
    && value !== null
    && 'objects' in value
    && Array.isArray(value.objects);
}

/**
 * CloudSigma API 2.0 client.
 *
 * Both collections are requested with `limit=0`, which makes the API return
 * every object in a single response.
 *
 * @see https://docs.cloudsigma.com/en/latest/general.html#limiting-the-returned-results
 */
export class CloudSigmaClient implements CloudSigmaApi {
  endpoint: string;
  private _http: HttpClient;
  private _logger: Logger;

  constructor(options: CloudSigmaClientOptions) {
    this.endpoint = options.endpoint.endsWith('/') ? options.endpoint : `${options.endpoint}/`;
    this._logger = (options.logger ?? getGlobalLogger()).child({ component: 'cloudsigma-client' });
    this._http = options.http ?? createHttpClient({
      baseUrl: this.endpoint,
      timeout: options.timeout,
      retry: options.retry,
      auth: { username: options.username, password: options.password },
    });
  }

  async listTags(): Promise<CloudSigmaTag[]> {
    return this._list<CloudSigmaTag>('tags/');
  }

  async listServersDetail(): Promise<CloudSigmaServer[]> {
    return this._list<CloudSigmaServer>('servers/detail/');
  }

  private async _list<T>(path: string): Promise<T[]> {
    const url = new URL(path, this.endpoint).toString();
    this._logger.debug({ url }, 'listing CloudSigma resources');

    let response: Response;
    try {
      response = await this._http.get(path, { query: { limit: 0 } });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      throw new CloudSigmaApiError(`CloudSigma request GET ${url} failed: ${error.message}`, {
        method: 'GET',
        url,
        original: error,
        statusCode: 503,
        retriable: true,
      });
    }

    const body = await response.text();

    if (!response.ok) {
      throw new CloudSigmaApiError(`CloudSigma request GET ${url} returned ${response.status}`, {
        method: 'GET',
        url,
        statusCode: response.status,
        responseBody: body.slice(0, 2048),
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (err) {
      throw new CloudSigmaApiError(`CloudSigma request GET ${url} returned invalid JSON`, {
        method: 'GET',
        url,
        statusCode: 502,
        original: err,
        responseBody: body.slice(0, 2048),
      });
    }

    if (!isListResponse(payload)) {
      throw new CloudSigmaApiError(`CloudSigma request GET ${url} returned no "objects" list`, {
        method: 'GET',
        url,
        statusCode: 502,
        responseBody: body.slice(0, 2048),
      });
    }

    this._logger.debug({ url, count: payload.objects.length }, 'listed CloudSigma resources');
    // The API is the source of truth for the record shape.
    return payload.objects as T[];
  }
}

export default CloudSigmaClient;
