import { cloneDeep } from 'lodash-es';
import { InventoryDataError } from '../errors.js';

export type HostVars = Record<string, unknown>;

export const ALL_GROUP = 'all';
export const UNGROUPED_GROUP = 'ungrouped';

export interface InventoryGroup {
  name: string;
  hosts: Set<string>;
  children: Set<string>;
  parents: Set<string>;
  vars: HostVars;
}

export interface InventoryHost {
  name: string;
  groups: Set<string>;
  vars: HostVars;
}

export interface ListedGroup {
  hosts?: string[];
  children?: string[];
  vars?: HostVars;
}

/** The `--list` document: one entry per group plus `_meta.hostvars`. */
export type InventoryListing = {
  _meta: { hostvars: Record<string, HostVars> };
} & Record<string, ListedGroup | { hostvars: Record<string, HostVars> }>;

/** Write side of the inventory, the part a sync run needs. */
export interface InventorySink {
  addGroup(name: string): string;
  addHost(name: string, group?: string): string;
  addChild(group: string, child: string): void;
  setVariable(entity: string, key: string, value: unknown): void;
  getHostVars(name: string): HostVars | undefined;
}

/**
 * In-memory inventory. Groups `all` and `ungrouped` always exist; a host
 * that ends up in no other group is listed under `ungrouped`.
 */
export class InventoryData implements InventorySink {
  groups: Map<string, InventoryGroup>;
  hosts: Map<string, InventoryHost>;

  constructor() {
    this.groups = new Map();
    this.hosts = new Map();
    this._createGroup(ALL_GROUP);
    this._createGroup(UNGROUPED_GROUP);
  }

  private _createGroup(name: string): InventoryGroup {
    const group: InventoryGroup = {
      name,
      hosts: new Set(),
      children: new Set(),
      parents: new Set(),
      vars: {},
    };
    this.groups.set(name, group);
    return group;
  }

  private _requireGroup(name: string): InventoryGroup {
    const group = this.groups.get(name);
    if (!group) {
      throw new InventoryDataError(`Could not find group ${name} in inventory`, { entity: name });
    }
    return group;
  }

  addGroup(name: string): string {
    if (!name) {
      throw new InventoryDataError('Invalid empty group name', {
        entity: name,
        statusCode: 400,
        suggestion: 'A group_tag_prefix equal to a whole tag name yields an empty group name; use a longer tag or a different prefix.',
      });
    }
    if (!this.groups.has(name)) {
      this._createGroup(name);
    }
    return name;
  }

  addHost(name: string, group?: string): string {
    if (!name) {
      throw new InventoryDataError('Invalid empty host name', { entity: name, statusCode: 400 });
    }

    const target = group ? this._requireGroup(group) : null;

    let host = this.hosts.get(name);
    if (!host) {
      host = { name, groups: new Set(), vars: {} };
      this.hosts.set(name, host);
    }

    if (target && target.name !== ALL_GROUP) {
      target.hosts.add(name);
      host.groups.add(target.name);
    }

    return name;
  }

  addChild(groupName: string, child: string): void {
    const group = this._requireGroup(groupName);

    const childGroup = this.groups.get(child);
    if (childGroup) {
      if (child === groupName || this._isAncestor(child, groupName)) {
        throw new InventoryDataError(`Adding group ${child} to ${groupName} would create a cycle`, {
          entity: child,
          statusCode: 400,
        });
      }
      group.children.add(child);
      childGroup.parents.add(groupName);
      return;
    }

    const host = this.hosts.get(child);
    if (host) {
      if (groupName !== ALL_GROUP) {
        group.hosts.add(child);
        host.groups.add(groupName);
      }
      return;
    }

    throw new InventoryDataError(`${child} is not a known host nor group`, { entity: child });
  }

  /** True when `candidate` is `group` itself or one of its parents, transitively. */
  private _isAncestor(candidate: string, group: string): boolean {
    const pending = [group];
    const seen = new Set<string>();
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) continue;
      if (current === candidate) return true;
      seen.add(current);
      const node = this.groups.get(current);
      if (node) pending.push(...node.parents);
    }
    return false;
  }

  setVariable(entity: string, key: string, value: unknown): void {
    const target = this.hosts.get(entity) ?? this.groups.get(entity);
    if (!target) {
      throw new InventoryDataError(`Could not identify group or host named ${entity}`, { entity });
    }
    target.vars[key] = cloneDeep(value);
  }

  getHost(name: string): InventoryHost | undefined {
    return this.hosts.get(name);
  }

  getHostVars(name: string): HostVars | undefined {
    const host = this.hosts.get(name);
    return host ? cloneDeep(host.vars) : undefined;
  }

  /** Groups a host belongs to, `ungrouped` included when it has no other. */
  getHostGroups(name: string): string[] {
    const host = this.hosts.get(name);
    if (!host) return [];
    return host.groups.size > 0 ? [...host.groups] : [UNGROUPED_GROUP];
  }

  private _ungroupedHosts(): string[] {
    const explicit = [...this.groups.get(UNGROUPED_GROUP)?.hosts ?? []];
    const implicit = [...this.hosts.values()]
      .filter(host => host.groups.size === 0)
      .map(host => host.name);
    return [...new Set([...explicit, ...implicit])];
  }

  private _topLevelGroups(): string[] {
    const top = [UNGROUPED_GROUP];
    for (const group of this.groups.values()) {
      if (group.name === ALL_GROUP || group.name === UNGROUPED_GROUP) continue;
      const parents = [...group.parents].filter(parent => parent !== ALL_GROUP);
      if (parents.length === 0) top.push(group.name);
    }
    return top;
  }

  private _members(name: string): ListedGroup {
    const group = this._requireGroup(name);
    const hosts = name === UNGROUPED_GROUP ? this._ungroupedHosts() : [...group.hosts];
    const children = name === ALL_GROUP ? this._topLevelGroups() : [...group.children];

    const listed: ListedGroup = {};
    if (hosts.length > 0) listed.hosts = hosts;
    if (children.length > 0) listed.children = children;
    if (Object.keys(group.vars).length > 0) listed.vars = cloneDeep(group.vars);
    return listed;
  }

  toListing(): InventoryListing {
    const hostvars: Record<string, HostVars> = {};
    for (const host of this.hosts.values()) {
      hostvars[host.name] = cloneDeep(host.vars);
    }

    const listing: InventoryListing = { _meta: { hostvars } };
    for (const name of this.groups.keys()) {
      listing[name] = this._members(name);
    }
    return listing;
  }

  /** Tree view of the inventory, starting at `root`. */
  toGraph(root: string = ALL_GROUP): string {
    this._requireGroup(root);
    const lines = [`@${root}:`];

    const walk = (groupName: string, depth: number): void => {
      const indent = '  |'.repeat(depth);
      const { hosts = [], children = [] } = this._members(groupName);
      for (const child of children) {
        lines.push(`${indent}--@${child}:`);
        walk(child, depth + 1);
      }
      for (const host of hosts) {
        lines.push(`${indent}--${host}`);
      }
    };

    walk(root, 1);
    return lines.join('\n');
  }
}

export default InventoryData;
