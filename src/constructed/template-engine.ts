import nunjucks, { type Environment, type Template } from 'nunjucks';
import { ExpressionError } from '../errors.js';

export type FilterFunction = (...args: unknown[]) => unknown;

export interface EvaluateOptions {
  /**
   * Fail on any variable the expression reads that is not defined, unless
   * it is guarded by `default` or an `is defined` test, and on an undefined
   * result.
   */
  strict?: boolean;
}

/** Evaluates a user expression against a host's variables. */
export interface ExpressionEvaluator {
  evaluate(expression: string, variables: Record<string, unknown>, options?: EvaluateOptions): unknown;
}

export interface TemplateEngineOptions {
  filters?: Record<string, FilterFunction>;
  cacheTemplates?: boolean;
}

/**
 * Jinja2-syntax expression evaluator backed by nunjucks.
 *
 * The expression is rendered as `{{ (expr) | dump }}` and the JSON is parsed
 * back, so lists, mappings, numbers and booleans keep their type.
 */
export class TemplateEngine implements ExpressionEvaluator {
  cacheTemplates: boolean;
  private _environments: Record<'strict' | 'lenient', Environment>;
  private _templateCache: Map<string, Template>;
  private _freeNamesCache: Map<string, string[]>;

  constructor(options: TemplateEngineOptions = {}) {
    this.cacheTemplates = options.cacheTemplates !== false;
    this._templateCache = new Map();
    this._freeNamesCache = new Map();
    this._environments = {
      strict: new nunjucks.Environment(null, { autoescape: false, throwOnUndefined: true }),
      lenient: new nunjucks.Environment(null, { autoescape: false, throwOnUndefined: false }),
    };

    for (const [name, fn] of Object.entries(options.filters ?? {})) {
      this._environments.strict.addFilter(name, fn);
      this._environments.lenient.addFilter(name, fn);
    }
  }

  private _compile(expression: string, strict: boolean): Template {
    const mode = strict ? 'strict' : 'lenient';
    const cacheKey = `${mode}:${expression}`;
    const cached = this.cacheTemplates ? this._templateCache.get(cacheKey) : undefined;
    if (cached) return cached;

    let template: Template;
    try {
      template = new nunjucks.Template(`{{ (${expression}) | dump }}`, this._environments[mode], undefined, true);
    } catch (err) {
      throw new ExpressionError(`Invalid expression "${expression}": ${cleanMessage(err)}`, {
        expression,
        original: err,
        suggestion: 'Check the expression syntax; compose, groups and keyed_groups take Jinja2 expressions without the {{ }} delimiters.',
      });
    }

    if (this.cacheTemplates) {
      this._templateCache.set(cacheKey, template);
    }
    return template;
  }

  private _freeNames(expression: string): string[] {
    const cached = this.cacheTemplates ? this._freeNamesCache.get(expression) : undefined;
    if (cached) return cached;

    const names = new Set<string>();
    collectFreeNames(parseExpression(expression), new Set<string>(), names);
    const result = [...names];

    if (this.cacheTemplates) {
      this._freeNamesCache.set(expression, result);
    }
    return result;
  }

  evaluate(expression: string, variables: Record<string, unknown>, options: EvaluateOptions = {}): unknown {
    const strict = options.strict ?? false;
    const template = this._compile(expression, strict);

    if (strict) {
      const missing = this._freeNames(expression).find(name => !isDefined(variables, name));
      if (missing !== undefined) {
        throw new ExpressionError(`Could not evaluate "${expression}": '${missing}' is undefined`, {
          expression,
          suggestion: `Guard the variable with ${missing} | default(...) or ${missing} is defined.`,
        });
      }
    }

    let rendered: string;
    try {
      rendered = template.render(variables);
    } catch (err) {
      throw new ExpressionError(`Could not evaluate "${expression}": ${cleanMessage(err)}`, {
        expression,
        original: err,
      });
    }

    if (rendered === '') {
      return undefined;
    }
    return JSON.parse(rendered);
  }

  clearCache(): void {
    this._templateCache.clear();
    this._freeNamesCache.clear();
  }
}

// ============================================
// Free variables
// ============================================

/** Functions nunjucks provides to every template. */
const NUNJUCKS_GLOBALS = new Set(['range', 'cycler', 'joiner']);
const GUARD_FILTERS = new Set(['default', 'd']);

interface ExpressionNode {
  typename: string;
  fields: string[];
  [field: string]: unknown;
}

interface NunjucksParser {
  parse(source: string): unknown;
}

function isNode(value: unknown): value is ExpressionNode {
  return typeof value === 'object' && value !== null
    && 'typename' in value && typeof value.typename === 'string'
    && 'fields' in value && Array.isArray(value.fields);
}

function isParser(value: unknown): value is NunjucksParser {
  return typeof value === 'object' && value !== null && 'parse' in value && typeof value.parse === 'function';
}

function isDefined(variables: Record<string, unknown>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(variables, name) && variables[name] !== undefined;
}

function parseExpression(expression: string): unknown {
  const parser: unknown = Reflect.get(nunjucks, 'parser');
  if (!isParser(parser)) {
    throw new ExpressionError('The nunjucks parser is not available', { expression });
  }
  return parser.parse(`{{ (${expression}) | dump }}`);
}

function symbolName(node: unknown): string | undefined {
  return isNode(node) && node.typename === 'Symbol' && typeof node.value === 'string' ? node.value : undefined;
}

function childNodes(node: unknown): unknown[] {
  return isNode(node) && Array.isArray(node.children) ? node.children : [];
}

/** The test name of the right-hand side of `x is <test>` or `x is <test>(args)`. */
function testName(node: unknown): string | undefined {
  if (isNode(node) && node.typename === 'FunCall') return symbolName(node.name);
  return symbolName(node);
}

interface DefinedNames {
  ifTrue: Set<string>;
  ifFalse: Set<string>;
}

/** Names a condition proves defined when it holds, and when it does not. */
function definedNames(node: unknown): DefinedNames {
  const result: DefinedNames = { ifTrue: new Set<string>(), ifFalse: new Set<string>() };
  if (!isNode(node)) return result;

  switch (node.typename) {
    case 'Group': {
      const children = childNodes(node);
      return children.length === 1 ? definedNames(children[0]) : result;
    }
    case 'Is': {
      const name = symbolName(node.left);
      const test = testName(node.right);
      if (name !== undefined && test === 'defined') result.ifTrue.add(name);
      if (name !== undefined && test === 'undefined') result.ifFalse.add(name);
      return result;
    }
    case 'Not': {
      const inner = definedNames(node.target);
      return { ifTrue: inner.ifFalse, ifFalse: inner.ifTrue };
    }
    case 'And': {
      const left = definedNames(node.left);
      const right = definedNames(node.right);
      return { ifTrue: new Set([...left.ifTrue, ...right.ifTrue]), ifFalse: new Set<string>() };
    }
    case 'Or': {
      const left = definedNames(node.left);
      const right = definedNames(node.right);
      return { ifTrue: new Set<string>(), ifFalse: new Set([...left.ifFalse, ...right.ifFalse]) };
    }
    default:
      return result;
  }
}

function withGuards(guarded: ReadonlySet<string>, extra: ReadonlySet<string>): Set<string> {
  return new Set([...guarded, ...extra]);
}

/**
 * Collects the variables an expression reads, leaving out filter and test
 * names, dictionary keys, nunjucks globals, and variables only read under
 * `default` or behind an `is defined` test.
 */
function collectFreeNames(node: unknown, guarded: ReadonlySet<string>, names: Set<string>): void {
  if (Array.isArray(node)) {
    for (const child of node) collectFreeNames(child, guarded, names);
    return;
  }
  if (!isNode(node)) return;

  switch (node.typename) {
    case 'Symbol': {
      const name = symbolName(node);
      if (name !== undefined && !guarded.has(name) && !NUNJUCKS_GLOBALS.has(name)) names.add(name);
      return;
    }
    case 'Filter': {
      const [subject, ...args] = childNodes(node.args);
      const filter = symbolName(node.name);
      const isGuard = filter !== undefined && GUARD_FILTERS.has(filter) && symbolName(subject) !== undefined;
      if (!isGuard) collectFreeNames(subject, guarded, names);
      collectFreeNames(args, guarded, names);
      return;
    }
    case 'FunCall': {
      const callee = symbolName(node.name);
      if (callee === undefined || !NUNJUCKS_GLOBALS.has(callee)) collectFreeNames(node.name, guarded, names);
      collectFreeNames(node.args, guarded, names);
      return;
    }
    case 'Is': {
      if (symbolName(node.left) === undefined) collectFreeNames(node.left, guarded, names);
      const test = node.right;
      if (isNode(test) && test.typename === 'FunCall') collectFreeNames(test.args, guarded, names);
      return;
    }
    case 'Pair': {
      if (symbolName(node.key) === undefined) collectFreeNames(node.key, guarded, names);
      collectFreeNames(node.value, guarded, names);
      return;
    }
    case 'And': {
      collectFreeNames(node.left, guarded, names);
      collectFreeNames(node.right, withGuards(guarded, definedNames(node.left).ifTrue), names);
      return;
    }
    case 'Or': {
      collectFreeNames(node.left, guarded, names);
      collectFreeNames(node.right, withGuards(guarded, definedNames(node.left).ifFalse), names);
      return;
    }
    case 'InlineIf': {
      const condition = definedNames(node.cond);
      collectFreeNames(node.cond, guarded, names);
      collectFreeNames(node.body, withGuards(guarded, condition.ifTrue), names);
      collectFreeNames(node.else_, withGuards(guarded, condition.ifFalse), names);
      return;
    }
    default:
      for (const field of node.fields) collectFreeNames(node[field], guarded, names);
  }
}

/** nunjucks prefixes messages with the template path and a stack of frames. */
function cleanMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  const lines = message
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && line !== '(unknown path)');
  return lines[lines.length - 1] ?? message;
}

export default TemplateEngine;
