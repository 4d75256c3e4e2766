export type CachePluginName = 'memory' | 'jsonfile';
export type GroupCharsPolicy = 'never' | 'always';

export interface KeyedGroupConfig {
  key: string;
  prefix?: string;
  separator?: string;
  parent_group?: string;
  default_value?: string;
  trailing_separator?: boolean;
}

/** The inventory source file after validation and defaults. */
export interface InventorySourceConfig {
  plugin: string;
  cloudsigma_region: string;
  cloudsigma_username: string;
  cloudsigma_password: string;
  group_tag_prefix?: string;
  include_running_only: boolean;
  include_tags?: string[];
  exclude_tags?: string[];
  strict: boolean;
  compose: Record<string, string>;
  groups: Record<string, string>;
  keyed_groups: KeyedGroupConfig[];
  leading_separator: boolean;
  transform_invalid_group_chars: GroupCharsPolicy;
  cache: boolean;
  cache_plugin: CachePluginName;
  cache_connection?: string;
  cache_prefix: string;
  cache_timeout: number;
}

/** Options for the composed variables and groups of a host. */
export interface ConstructedOptions {
  strict: boolean;
  compose: Record<string, string>;
  groups: Record<string, string>;
  keyedGroups: KeyedGroupConfig[];
  leadingSeparator: boolean;
  transformInvalidGroupChars: GroupCharsPolicy;
}

export interface InventorySyncOptions extends ConstructedOptions {
  region: string;
  username: string;
  password: string;
  groupTagPrefix?: string;
  includeRunningOnly: boolean;
  includeTags?: string[];
  excludeTags?: string[];
}
