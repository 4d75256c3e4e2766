export interface RedactRules {
  paths: string[];
  censor: string;
}

const DEFAULT_REDACT_PATHS = [
  'password',
  'cloudsigma_password',
  'credentials.password',
  'auth.password',
  'config.cloudsigma_password',
  'headers.Authorization',
  'headers.authorization',
];

export const REDACTED = '***REDACTED***';

/**
 * Build pino redaction rules. `extraPaths` are appended to the defaults, so
 * the credentials are always masked.
 */
export function createRedactRules(extraPaths: string[] = []): RedactRules {
  return {
    paths: [...new Set([...DEFAULT_REDACT_PATHS, ...extraPaths])],
    censor: REDACTED,
  };
}
