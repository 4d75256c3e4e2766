/**
 * Central type definitions for cloudsigma-inventory
 *
 * import type { CloudSigmaServer, KeyedGroupConfig } from './types/index.js';
 */

export type * from './cloudsigma.types.js';
export type * from './config.types.js';
export type * from './cli.types.js';
