export interface CliOptions {
  inventory?: string;
  list?: boolean;
  host?: string;
  /** `true` when given without a group name. */
  graph?: string | boolean;
  yaml?: boolean;
  flushCache?: boolean;
  verbose?: boolean;
}
