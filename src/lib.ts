/**
 * ebuild-history Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Ebuild domain model
export * from './ebuild/index.js';

// Git history
export * from './history/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type HistoryConfig } from './config/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
