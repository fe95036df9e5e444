/**
 * @sessionkit/session-registry
 *
 * Product code to trading session registry, loaded from CSV configuration
 * with atomic merge reloads.
 *
 * @example
 * ```typescript
 * import { SessionRegistry } from '@sessionkit/session-registry';
 * import { createLogger } from '@sessionkit/logger';
 *
 * const registry = new SessionRegistry({ logger: createLogger({ level: 'info' }) });
 * registry.loadFile('./config/sessions.csv');
 *
 * registry.inSession('ag', { hour: 22, minute: 0 }); // true
 * registry.morningBegin('ag', 'minute');              // 540
 * registry.get('unknown');                            // undefined
 * ```
 */

export { SessionRegistry } from './registry.js';

export type { SessionSource, LoadOptions, LoadSummary, LoadResult, SessionRegistryOptions } from './types.js';

export { parseSessionRows, readSessionFile, rowsFromJsonMap } from './loader.js';

export { parseJsonSlices, jsonSlicesSchema } from './json-slices.js';
export type { JsonSliceContext } from './json-slices.js';

export { splitFields, stripBom } from './csv.js';

export {
  registryConfigSchema,
  envMapping,
  loadRegistryConfig,
  createLoggerFromConfig,
  createRegistryFromConfig,
} from './config.js';
export type { RegistryConfig } from './config.js';
