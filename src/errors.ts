/**
 * Inventory Error Classes
 *
 * Typed error hierarchy for cloudsigma-inventory operations.
 */

export type StringRecord = Record<string, unknown>;

/** Base error context for all inventory errors */
export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  docs?: string;
  title?: string;
  [key: string]: unknown;
}

/** Serialized error format */
export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode: number;
  thrownAt: Date;
  retriable: boolean;
  suggestion?: string;
  docs?: string;
  title: string;
  description?: string;
  data: StringRecord;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  thrownAt: Date;
  code?: string;
  statusCode: number;
  original?: unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  docs?: string;
  title: string;
  data: StringRecord;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      original,
      description,
      suggestion,
      retriable,
      docs,
      title,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }

    this.name = this.constructor.name;
    this.thrownAt = new Date();
    this.code = code;
    this.statusCode = statusCode ?? 500;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.docs = docs;
    this.title = title || this.constructor.name;
    this.data = { ...rest, message };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      docs: this.docs,
      title: this.title,
      description: this.description,
      data: this.data,
      original: this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

export interface InventoryErrorDetails {
  code?: string;
  original?: unknown;
  statusCode?: number;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  docs?: string;
  title?: string;
  [key: string]: unknown;
}

export class InventoryError extends BaseError {
  constructor(message: string, details: InventoryErrorDetails = {}) {
    super({ message, ...details });
  }
}

export interface ConfigurationErrorDetails extends InventoryErrorDetails {
  path?: string;
  field?: string;
  issues?: string[];
}

/** Invalid or unreadable inventory source. Always raised before any API call. */
export class ConfigurationError extends InventoryError {
  path?: string;
  field?: string;
  issues: string[];

  constructor(message: string, details: ConfigurationErrorDetails = {}) {
    const { path, field, issues = [], ...rest } = details;
    super(message, {
      statusCode: 400,
      retriable: false,
      suggestion: 'Check the inventory source file against the documented options.',
      ...rest,
      path,
      field,
      issues,
    });
    this.path = path;
    this.field = field;
    this.issues = issues;
  }
}

export interface TagLookupErrorDetails extends InventoryErrorDetails {
  tagUuid: string;
  serverName: string;
}

/** A server references a tag uuid that is absent from the tag list of the same run. */
export class TagLookupError extends InventoryError {
  tagUuid: string;
  serverName: string;

  constructor(message: string, details: TagLookupErrorDetails) {
    super(message, {
      statusCode: 409,
      retriable: true,
      suggestion: 'A tag was probably created or deleted while the inventory was being fetched. Run the inventory again.',
      ...details,
    });
    this.tagUuid = details.tagUuid;
    this.serverName = details.serverName;
  }
}

export interface CloudSigmaApiErrorDetails extends InventoryErrorDetails {
  method: string;
  url: string;
  responseBody?: string;
}

export class CloudSigmaApiError extends InventoryError {
  method: string;
  url: string;
  responseBody?: string;

  constructor(message: string, details: CloudSigmaApiErrorDetails) {
    const statusCode = details.statusCode ?? 502;
    let suggestion = details.suggestion;
    if (!suggestion) {
      if (statusCode === 401 || statusCode === 403) {
        suggestion = 'Check cloudsigma_username/cloudsigma_password (or CLOUDSIGMA_USERNAME/CLOUDSIGMA_PASSWORD).';
      } else if (statusCode === 404) {
        suggestion = 'Check that cloudsigma_region points to the location the account lives in.';
      } else {
        suggestion = 'The CloudSigma API request failed. Retry later or check the API status page.';
      }
    }

    super(message, {
      ...details,
      statusCode,
      retriable: details.retriable ?? (statusCode === 429 || statusCode >= 500),
      suggestion,
    });
    this.method = details.method;
    this.url = details.url;
    this.responseBody = details.responseBody;
  }
}

export interface CompositionErrorDetails extends InventoryErrorDetails {
  host: string;
  expression?: string;
}

/** A compose, groups or keyed_groups expression could not be evaluated. */
export class CompositionError extends InventoryError {
  host: string;
  expression?: string;

  constructor(message: string, details: CompositionErrorDetails) {
    super(message, {
      statusCode: 422,
      retriable: false,
      suggestion: 'Check the expression syntax and that every variable it uses is set on the host, or disable strict.',
      ...details,
    });
    this.host = details.host;
    this.expression = details.expression;
  }
}

export interface InventoryDataErrorDetails extends InventoryErrorDetails {
  entity: string;
}

export class InventoryDataError extends InventoryError {
  entity: string;

  constructor(message: string, details: InventoryDataErrorDetails) {
    super(message, {
      statusCode: 404,
      retriable: false,
      ...details,
    });
    this.entity = details.entity;
  }
}

export interface CacheErrorDetails extends InventoryErrorDetails {
  driver?: string;
  operation?: string;
  key?: string;
}

export class CacheError extends InventoryError {
  driver: string;
  operation: string;

  constructor(message: string, details: CacheErrorDetails = {}) {
    const { driver = 'unknown', operation = 'unknown', ...rest } = details;
    super(message, {
      statusCode: 500,
      retriable: false,
      suggestion: 'Check cache_connection permissions, or disable the inventory cache.',
      ...rest,
      driver,
      operation,
    });
    this.driver = driver;
    this.operation = operation;
  }
}

export interface ExpressionErrorDetails extends InventoryErrorDetails {
  expression: string;
}

/** A template expression failed to compile or render. */
export class ExpressionError extends InventoryError {
  expression: string;

  constructor(message: string, details: ExpressionErrorDetails) {
    super(message, {
      statusCode: 422,
      retriable: false,
      ...details,
    });
    this.expression = details.expression;
  }
}
