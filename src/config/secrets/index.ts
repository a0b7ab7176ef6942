/**
 * Secret Management
 *
 * Resolves {"$secret": "NAME"} descriptors in configuration files so signing
 * keys and connection strings never have to be written into them.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
