/**
 * Environment Variable Secret Provider
 *
 * Fallback provider for development and platforms that inject secrets as
 * environment variables. Values are visible to child processes, so file
 * secrets take precedence in the default chain.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * @returns the trimmed variable value, or undefined when unset or empty
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value.trim() === '') {
      return undefined;
    }

    return value.trim();
  }
}
