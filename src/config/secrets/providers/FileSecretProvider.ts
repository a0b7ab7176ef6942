/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}`, the layout used by Docker and Kubernetes
 * secret mounts. Preferred in production: secrets never pass through
 * process.env.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { ISecretProvider } from '../ISecretProvider.js';

const EXPECTED_READ_ERRORS = new Set(['ENOENT', 'EACCES', 'EISDIR']);

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  /**
   * @param secretDir - Directory holding one file per secret (default: /run/secrets)
   */
  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  /**
   * @returns file contents (trimmed), or undefined when the file is missing,
   *          unreadable or outside the secret directory
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    // Path traversal guard
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');
      return secretValue.trim();
    } catch (error) {
      const code =
        typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

      if (typeof code === 'string' && EXPECTED_READ_ERRORS.has(code)) {
        return undefined;
      }

      console.warn(
        `[FileSecretProvider] Unexpected error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }
}
