import { isPlainObject } from 'lodash-es';
import { CompositionError } from '../errors.js';
import { getGlobalLogger, type Logger } from '../concerns/logger.js';
import { hasInvalidGroupChars, toSafeGroupName } from '../concerns/group-names.js';
import type { HostVars, InventorySink } from '../inventory/inventory-data.class.js';
import type { ConstructedOptions, GroupCharsPolicy, KeyedGroupConfig } from '../types/config.types.js';
import type { ExpressionEvaluator } from './template-engine.js';

export interface ConstructableOptions {
  inventory: InventorySink;
  evaluator: ExpressionEvaluator;
  leadingSeparator?: boolean;
  transformInvalidGroupChars?: GroupCharsPolicy;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

/** Jinja truthiness: empty lists and mappings are false. */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Adds user-defined variables and groups to hosts from expressions over the
 * host's variables: `compose`, `groups` and `keyed_groups`.
 *
 * Expressions are always evaluated strictly, so an undefined variable is an
 * error; `strict` decides whether that error aborts the run or the entry is
 * skipped.
 */
export class Constructable {
  inventory: InventorySink;
  evaluator: ExpressionEvaluator;
  leadingSeparator: boolean;
  transformInvalidGroupChars: GroupCharsPolicy;
  private _logger: Logger;
  private _warnedGroupNames: Set<string>;

  constructor(options: ConstructableOptions) {
    this.inventory = options.inventory;
    this.evaluator = options.evaluator;
    this.leadingSeparator = options.leadingSeparator ?? true;
    this.transformInvalidGroupChars = options.transformInvalidGroupChars ?? 'never';
    this._logger = (options.logger ?? getGlobalLogger()).child({ component: 'constructable' });
    this._warnedGroupNames = new Set();
  }

  private _sanitizeGroupName(name: string): string {
    const safe = toSafeGroupName(name, this.transformInvalidGroupChars);
    if (safe === name && hasInvalidGroupChars(name) && !this._warnedGroupNames.has(name)) {
      this._warnedGroupNames.add(name);
      this._logger.warn({ group: name }, 'group name contains invalid characters; set transform_invalid_group_chars: always to replace them');
    }
    return safe;
  }

  private _hostVariables(variables: HostVars, host: string): HostVars {
    return { ...variables, ...this.inventory.getHostVars(host) };
  }

  setCompositeVars(compose: Record<string, string>, variables: HostVars, host: string, strict: boolean = false): void {
    for (const [varName, expression] of Object.entries(compose)) {
      let value: unknown;
      try {
        value = this.evaluator.evaluate(expression, variables, { strict: true });
      } catch (err) {
        if (strict) {
          throw new CompositionError(`Could not set ${varName} for host ${host}: ${describeError(err)}`, {
            host,
            expression,
            original: err,
          });
        }
        this._logger.debug({ host, variable: varName, error: describeError(err) }, 'skipping composed variable');
        continue;
      }
      this.inventory.setVariable(host, varName, value);
    }
  }

  addHostToComposedGroups(groups: Record<string, string>, variables: HostVars, host: string, strict: boolean = false): void {
    const merged = this._hostVariables(variables, host);

    for (const [rawGroupName, condition] of Object.entries(groups)) {
      const groupName = this._sanitizeGroupName(rawGroupName);
      let result: boolean;
      try {
        result = isTruthy(this.evaluator.evaluate(condition, merged, { strict: true }));
      } catch (err) {
        if (strict) {
          throw new CompositionError(`Could not add host ${host} to group ${groupName}: ${describeError(err)}`, {
            host,
            expression: condition,
            original: err,
          });
        }
        continue;
      }

      if (result) {
        this.inventory.addGroup(groupName);
        this.inventory.addChild(groupName, host);
      }
    }
  }

  addHostToKeyedGroups(keyedGroups: KeyedGroupConfig[], variables: HostVars, host: string, strict: boolean = false): void {
    const merged = this._hostVariables(variables, host);

    for (const keyed of keyedGroups) {
      let key: unknown;
      try {
        key = this.evaluator.evaluate(keyed.key, merged, { strict: true });
      } catch (err) {
        if (strict) {
          throw new CompositionError(`Could not generate group for host ${host} from ${keyed.key} entry: ${describeError(err)}`, {
            host,
            expression: keyed.key,
            original: err,
          });
        }
        continue;
      }

      const defaultValue = keyed.default_value;
      const trailingSeparator = keyed.trailing_separator;
      if (trailingSeparator !== undefined && defaultValue !== undefined) {
        throw new CompositionError('parameters are mutually exclusive for keyed groups: default_value|trailing_separator', {
          host,
          expression: keyed.key,
          statusCode: 400,
        });
      }

      if (!isTruthy(key) && !(key === '' && defaultValue !== undefined)) {
        if (strict) {
          throw new CompositionError(`No key or key resulted empty for ${keyed.key} in host ${host}, invalid entry`, {
            host,
            expression: keyed.key,
          });
        }
        continue;
      }

      const prefix = keyed.prefix ?? '';
      let separator = keyed.separator ?? '_';
      const bareNames = this._bareGroupNames(key, keyed, separator, host);

      if (prefix === '' && !this.leadingSeparator) {
        separator = '';
      }

      for (const bareName of bareNames) {
        const groupName = this.inventory.addGroup(this._sanitizeGroupName(`${prefix}${separator}${bareName}`));
        this.inventory.addHost(host, groupName);

        if (keyed.parent_group) {
          const parentName = this.inventory.addGroup(this._sanitizeGroupName(keyed.parent_group));
          this.inventory.addChild(parentName, groupName);
        }
      }
    }
  }

  private _bareGroupNames(key: unknown, keyed: KeyedGroupConfig, separator: string, host: string): string[] {
    const defaultValue = keyed.default_value;

    if (typeof key === 'string' || typeof key === 'number' || typeof key === 'boolean') {
      const name = String(key);
      return [name === '' && defaultValue !== undefined ? defaultValue : name];
    }

    if (Array.isArray(key)) {
      return key.map(item => {
        const name = String(item);
        return name === '' && defaultValue !== undefined ? defaultValue : name;
      });
    }

    if (isRecord(key)) {
      return Object.entries(key).map(([name, rawValue]) => {
        const value = String(rawValue);
        if (value === '') {
          if (defaultValue !== undefined) return `${name}${separator}${defaultValue}`;
          if (keyed.trailing_separator === false) return name;
        }
        return `${name}${separator}${value}`;
      });
    }

    throw new CompositionError(
      `Invalid group name format, expected a string or a list of them or dictionary, got: ${typeof key}`,
      { host, expression: keyed.key, statusCode: 400 }
    );
  }

  /**
   * Composed variables (always strict), then composed and keyed groups with
   * the configured strictness.
   */
  construct(host: string, variables: HostVars, options: Pick<ConstructedOptions, 'strict' | 'compose' | 'groups' | 'keyedGroups'>): void {
    this.setCompositeVars(options.compose, variables, host, true);
    this.addHostToComposedGroups(options.groups, variables, host, options.strict);
    this.addHostToKeyedGroups(options.keyedGroups, variables, host, options.strict);
  }
}

export default Constructable;
