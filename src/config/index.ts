/**
 * Configuration Module - Public API
 */

// ============================================================================
// Configuration Manager
// ============================================================================

export { ConfigManager, ENV_OVERRIDES, type ConfigManagerOptions } from './manager.js';

// ============================================================================
// Schemas
// ============================================================================

export * from './schemas/index.js';

// ============================================================================
// Secrets
// ============================================================================

export * from './secrets/index.js';
