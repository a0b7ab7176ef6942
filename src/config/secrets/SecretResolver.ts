/**
 * Secret Resolver
 *
 * Walks a parsed configuration object and replaces every
 * `{"$secret": "NAME"}` descriptor with the value returned by the first
 * provider in the chain that knows NAME.
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const raw: unknown = JSON.parse(await readFile('auth.json', 'utf-8'));
 * await resolver.resolveSecrets(raw); // modifies raw in place
 * ```
 */

import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Optional audit service for logging secret access */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret !== ''
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider. Providers are queried in the order they were added.
   *
   * @throws Error if the object does not implement ISecretProvider
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve every descriptor in `config`, in place.
   *
   * @throws Error if failFast is set and a descriptor cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  public clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const resolved = await this.resolveChild(node[i], `${path}[${i}]`);
        if (resolved !== undefined) {
          node[i] = resolved;
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const resolved = await this.resolveChild(node[key], `${path}.${key}`);
      if (resolved !== undefined) {
        node[key] = resolved;
      }
    }
  }

  /**
   * @returns the replacement value for a descriptor child, undefined otherwise
   */
  private async resolveChild(child: unknown, path: string): Promise<string | undefined> {
    if (!isSecretDescriptor(child)) {
      await this.resolveNode(child, path);
      return undefined;
    }

    const value = await this.resolveSecret(child.$secret, path);
    if (value !== undefined) {
      return value;
    }

    const message = `Secret "${child.$secret}" at path "${path}" could not be resolved by any provider.`;
    if (this.failFast) {
      throw new Error(`[SecretResolver] ${message}`);
    }
    console.warn(`[SecretResolver] ${message}`);
    return undefined;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          await this.auditService?.log({
            source: 'secret:resolution',
            timestamp: new Date(),
            userId: 'system',
            action: `resolve:${logicalName}`,
            success: true,
            metadata: {
              secretName: logicalName,
              provider: provider.constructor.name,
              configPath: path,
            },
          });
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.auditService?.log({
      source: 'secret:resolution',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      metadata: {
        secretName: logicalName,
        provider: 'none',
        configPath: path,
        error: 'No provider could resolve this secret',
      },
    });
    return undefined;
  }
}
