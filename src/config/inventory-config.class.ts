import { access, readFile } from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { createHash } from 'crypto';
import Validator, { type ValidationSchema } from 'fastest-validator';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors.js';
import tryFn from '../concerns/try-fn.js';
import type { InventorySourceConfig, InventorySyncOptions, KeyedGroupConfig } from '../types/config.types.js';

export const PLUGIN_NAME = 'cloudsigma_inventory';
export const SOURCE_FILE_SUFFIXES = ['cloudsigma.yaml', 'cloudsigma.yml'] as const;

export const CONFIG_DEFAULTS = {
  include_running_only: true,
  strict: false,
  leading_separator: true,
  transform_invalid_group_chars: 'never',
  cache: false,
  cache_plugin: 'memory',
  cache_prefix: PLUGIN_NAME,
  cache_timeout: 3600,
} as const;

const stringMap = { type: 'record', key: { type: 'string' }, value: { type: 'string' }, optional: true } as const;
const stringList = { type: 'array', items: 'string', optional: true } as const;

const SOURCE_SCHEMA: ValidationSchema = {
  $$strict: true,
  plugin: { type: 'equal', value: PLUGIN_NAME, strict: true },
  cloudsigma_region: { type: 'string', empty: false },
  cloudsigma_username: { type: 'string', optional: true },
  cloudsigma_password: { type: 'string', optional: true },
  group_tag_prefix: { type: 'string', optional: true },
  include_running_only: { type: 'boolean', optional: true, convert: true },
  include_tags: stringList,
  exclude_tags: stringList,
  strict: { type: 'boolean', optional: true, convert: true },
  compose: stringMap,
  groups: stringMap,
  keyed_groups: {
    type: 'array',
    optional: true,
    items: {
      type: 'object',
      strict: true,
      props: {
        key: { type: 'string', empty: false },
        prefix: { type: 'string', optional: true },
        separator: { type: 'string', optional: true },
        parent_group: { type: 'string', optional: true },
        default_value: { type: 'string', optional: true },
        trailing_separator: { type: 'boolean', optional: true, convert: true },
      },
    },
  },
  leading_separator: { type: 'boolean', optional: true, convert: true },
  transform_invalid_group_chars: { type: 'enum', values: ['never', 'always'], optional: true },
  cache: { type: 'boolean', optional: true, convert: true },
  cache_plugin: { type: 'enum', values: ['memory', 'jsonfile'], optional: true },
  cache_connection: { type: 'string', optional: true },
  cache_prefix: { type: 'string', optional: true, empty: false },
  cache_timeout: { type: 'number', integer: true, min: 0, optional: true, convert: true },
};

const validator = new Validator({ useNewCustomCheckerFunction: true });

export type ConfigEnvironment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** YAML `key:` with no value parses to null; treat it as unset. */
function dropNulls(raw: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== null));
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalStringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.map(String) : undefined;
}

function stringRecord(value: unknown): Record<string, string> {
  if (!isRecord(value)) return {};
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, String(entry)]));
}

function keyedGroups(value: unknown): KeyedGroupConfig[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map(entry => {
    const keyed: KeyedGroupConfig = { key: String(entry.key) };
    if (typeof entry.prefix === 'string') keyed.prefix = entry.prefix;
    if (typeof entry.separator === 'string') keyed.separator = entry.separator;
    if (typeof entry.parent_group === 'string') keyed.parent_group = entry.parent_group;
    if (typeof entry.default_value === 'string') keyed.default_value = entry.default_value;
    if (typeof entry.trailing_separator === 'boolean') keyed.trailing_separator = entry.trailing_separator;
    return keyed;
  });
}

/**
 * A validated inventory source file. Built once per parse and handed to the
 * sync as a plain options value.
 */
export class InventoryConfig {
  path: string;
  source: InventorySourceConfig;

  constructor(path: string, source: InventorySourceConfig) {
    this.path = path;
    this.source = source;
  }

  /** Name check plus a readability check; never throws. */
  static async verifyFile(path: string): Promise<boolean> {
    if (!SOURCE_FILE_SUFFIXES.some(suffix => path.endsWith(suffix))) {
      return false;
    }
    const [readable] = await tryFn(access(path, fsConstants.R_OK));
    return readable;
  }

  static async load(path: string, env: ConfigEnvironment = process.env): Promise<InventoryConfig> {
    const [ok, err, content] = await tryFn(readFile(path, 'utf8'));
    if (!ok) {
      throw new ConfigurationError(`Unable to read inventory source ${path}: ${err.message}`, {
        path,
        original: err,
      });
    }
    return InventoryConfig.fromYaml(content, path, env);
  }

  static async fromYaml(content: string, path: string, env: ConfigEnvironment = process.env): Promise<InventoryConfig> {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (err) {
      throw new ConfigurationError(`Inventory source ${path} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`, {
        path,
        original: err,
      });
    }

    if (!isRecord(raw)) {
      throw new ConfigurationError(`Inventory source ${path} must be a YAML mapping`, { path });
    }

    return InventoryConfig.fromObject(raw, path, env);
  }

  static async fromObject(raw: Record<string, unknown>, path: string, env: ConfigEnvironment = process.env): Promise<InventoryConfig> {
    const data = dropNulls(raw);
    const result = await validator.validate(data, SOURCE_SCHEMA);

    if (result !== true) {
      const issues = result.map(issue => issue.message ?? `${issue.field}: ${issue.type}`);
      const plugin = result.find(issue => issue.field === 'plugin');
      throw new ConfigurationError(
        plugin ? `Incorrect plugin name in file ${path}: ${plugin.message ?? 'expected ' + PLUGIN_NAME}` : `Invalid inventory source ${path}: ${issues.join('; ')}`,
        { path, field: result[0]?.field, issues }
      );
    }

    const cachePlugin = data.cache_plugin === 'jsonfile' ? 'jsonfile' : CONFIG_DEFAULTS.cache_plugin;
    const cacheConnection = optionalString(data.cache_connection);
    const cacheEnabled = typeof data.cache === 'boolean' ? data.cache : CONFIG_DEFAULTS.cache;

    if (cacheEnabled && cachePlugin === 'jsonfile' && !cacheConnection) {
      throw new ConfigurationError(`Inventory source ${path} enables the jsonfile cache without cache_connection`, {
        path,
        field: 'cache_connection',
        suggestion: 'Set cache_connection to the directory the cache files are written to.',
      });
    }

    const source: InventorySourceConfig = {
      plugin: PLUGIN_NAME,
      cloudsigma_region: String(data.cloudsigma_region).toLowerCase(),
      cloudsigma_username: optionalString(data.cloudsigma_username) ?? env.CLOUDSIGMA_USERNAME ?? '',
      cloudsigma_password: optionalString(data.cloudsigma_password) ?? env.CLOUDSIGMA_PASSWORD ?? '',
      group_tag_prefix: optionalString(data.group_tag_prefix),
      include_running_only: typeof data.include_running_only === 'boolean' ? data.include_running_only : CONFIG_DEFAULTS.include_running_only,
      include_tags: optionalStringList(data.include_tags),
      exclude_tags: optionalStringList(data.exclude_tags),
      strict: typeof data.strict === 'boolean' ? data.strict : CONFIG_DEFAULTS.strict,
      compose: stringRecord(data.compose),
      groups: stringRecord(data.groups),
      keyed_groups: keyedGroups(data.keyed_groups),
      leading_separator: typeof data.leading_separator === 'boolean' ? data.leading_separator : CONFIG_DEFAULTS.leading_separator,
      transform_invalid_group_chars: data.transform_invalid_group_chars === 'always' ? 'always' : CONFIG_DEFAULTS.transform_invalid_group_chars,
      cache: cacheEnabled,
      cache_plugin: cachePlugin,
      cache_connection: cacheConnection,
      cache_prefix: optionalString(data.cache_prefix) ?? CONFIG_DEFAULTS.cache_prefix,
      cache_timeout: typeof data.cache_timeout === 'number' ? data.cache_timeout : CONFIG_DEFAULTS.cache_timeout,
    };

    return new InventoryConfig(path, source);
  }

  /** Per-source cache key: plugin name plus short digests of the path. */
  get cacheKey(): string {
    const digest = createHash('sha1').update(this.path).digest('hex');
    return `${PLUGIN_NAME}_s_${digest.slice(0, 5)}_${digest.slice(-5)}`;
  }

  toSyncOptions(): InventorySyncOptions {
    const { source } = this;
    return {
      region: source.cloudsigma_region,
      username: source.cloudsigma_username,
      password: source.cloudsigma_password,
      groupTagPrefix: source.group_tag_prefix,
      includeRunningOnly: source.include_running_only,
      includeTags: source.include_tags,
      excludeTags: source.exclude_tags,
      strict: source.strict,
      compose: source.compose,
      groups: source.groups,
      keyedGroups: source.keyed_groups,
      leadingSeparator: source.leading_separator,
      transformInvalidGroupChars: source.transform_invalid_group_chars,
    };
  }
}

export default InventoryConfig;
