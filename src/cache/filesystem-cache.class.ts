import { readFile, writeFile, unlink, readdir, mkdir } from 'fs/promises';
import path from 'path';
import { Cache, type CacheConfig, type CacheEntry } from './cache.class.js';
import tryFn from '../concerns/try-fn.js';
import { CacheError } from '../errors.js';

export interface FilesystemCacheConfig extends CacheConfig {
  directory: string;
  prefix?: string;
  fileExtension?: string;
  fileMode?: number;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'key' in value && typeof value.key === 'string'
    && 'storedAt' in value && typeof value.storedAt === 'number'
    && 'ttl' in value && typeof value.ttl === 'number'
    && 'value' in value;
}

/**
 * One JSON file per key under `directory`, named `<prefix>_<key><ext>`.
 * Unreadable or corrupt files count as misses and are removed.
 */
export class FilesystemCache extends Cache {
  directory: string;
  prefix: string;
  fileExtension: string;
  fileMode: number;

  constructor({
    directory,
    prefix = 'cloudsigma_inventory',
    fileExtension = '.json',
    fileMode = 0o600,
    ...config
  }: FilesystemCacheConfig) {
    super(config);

    if (!directory) {
      throw new CacheError('FilesystemCache requires a directory', {
        driver: 'filesystem',
        operation: 'constructor',
        statusCode: 400,
        suggestion: 'Set cache_connection to a writable directory when cache_plugin is jsonfile.'
      });
    }

    this.directory = path.resolve(directory);
    this.prefix = prefix;
    this.fileExtension = fileExtension;
    this.fileMode = fileMode;
  }

  getFilePath(key: string): string {
    const sanitizedKey = key.replace(/[<>:"/\\|?*]/g, '_');
    return path.join(this.directory, `${this.prefix}_${sanitizedKey}${this.fileExtension}`);
  }

  protected async _write(entry: CacheEntry): Promise<void> {
    const [ok, err] = await tryFn(async () => {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.getFilePath(entry.key), JSON.stringify(entry), { encoding: 'utf8', mode: this.fileMode });
    });

    if (!ok) {
      throw new CacheError(`Failed to set cache key '${entry.key}': ${err.message}`, {
        driver: 'filesystem',
        operation: 'set',
        key: entry.key,
        directory: this.directory,
        original: err
      });
    }
  }

  protected async _read(key: string): Promise<CacheEntry | null> {
    const filePath = this.getFilePath(key);
    const [found, , content] = await tryFn(readFile(filePath, 'utf8'));
    if (!found) return null;

    const [parsed, , entry] = await tryFn(async (): Promise<unknown> => JSON.parse(content));
    if (!parsed || !isCacheEntry(entry)) {
      await this._remove(key);
      return null;
    }
    return entry;
  }

  protected async _remove(key: string): Promise<void> {
    const [ok, err] = await tryFn(unlink(this.getFilePath(key)));
    if (!ok && !('code' in err && err.code === 'ENOENT')) {
      throw new CacheError(`Failed to delete cache key '${key}': ${err.message}`, {
        driver: 'filesystem',
        operation: 'delete',
        key,
        original: err
      });
    }
  }

  protected async _clear(): Promise<void> {
    const [ok, , files] = await tryFn(readdir(this.directory));
    if (!ok) return;

    const owned = files.filter(file => file.startsWith(`${this.prefix}_`) && file.endsWith(this.fileExtension));
    await Promise.all(owned.map(file => unlink(path.join(this.directory, file))));
  }
}

export default FilesystemCache;
