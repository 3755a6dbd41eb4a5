/**
 * Registry module: validated, immutable category definitions.
 */

export { buildRegistry } from './build.js';
export { validateRegistryConfig, inspectRegistryConfig, normalizeOptionsFor } from './validate.js';
export { RegistryValidationError } from './errors.js';
export type { Registry, IndexedTerm, CompiledPattern } from './types.js';
export type { RegistryInspection } from './validate.js';
