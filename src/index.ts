// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Provider layer exports
export * from './providers/index.js';

// HTTP layer exports
export * from './http/index.js';

// Configuration exports
export * from './config/index.js';

// Security exports
export { BcryptPasswordHasher, type PasswordHasher } from './security/password-hasher.js';

// Utility exports
export * from './utils/errors.js';
