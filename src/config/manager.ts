import { readFile } from 'node:fs/promises';
import { AuthSettingsSchema, type AuthSettings } from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';
import { ConfigurationError } from '../utils/errors.js';

// ============================================================================
// Environment overrides
// ============================================================================

type EnvParser = (raw: string, variable: string) => unknown;

interface EnvOverride {
  variable: string;
  path: readonly string[];
  parse: EnvParser;
}

const parseString: EnvParser = (raw) => raw;

const parseBoolean: EnvParser = (raw, variable) => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  throw new ConfigurationError(`${variable} must be one of true, false, 1, 0`);
};

const parseInteger: EnvParser = (raw, variable) => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${variable} must be an integer`);
  }
  return Number.parseInt(trimmed, 10);
};

export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: 'AUTH__ENABLED', path: ['enabled'], parse: parseBoolean },
  { variable: 'AUTH__JWT__ENABLED', path: ['jwt', 'enabled'], parse: parseBoolean },
  { variable: 'AUTH__JWT__SECRET_KEY', path: ['jwt', 'secretKey'], parse: parseString },
  { variable: 'AUTH__JWT__ALGORITHM', path: ['jwt', 'algorithm'], parse: parseString },
  {
    variable: 'AUTH__JWT__ACCESS_TOKEN_EXPIRE_MINUTES',
    path: ['jwt', 'accessTokenExpireMinutes'],
    parse: parseInteger,
  },
  {
    variable: 'AUTH__JWT__REFRESH_TOKEN_EXPIRE_DAYS',
    path: ['jwt', 'refreshTokenExpireDays'],
    parse: parseInteger,
  },
  {
    variable: 'AUTH__JWT__BLACKLIST__BACKEND',
    path: ['jwt', 'blacklist', 'backend'],
    parse: parseString,
  },
  {
    variable: 'AUTH__JWT__BLACKLIST__REDIS_URL',
    path: ['jwt', 'blacklist', 'redisUrl'],
    parse: parseString,
  },
  { variable: 'AUTH__API_KEY__ENABLED', path: ['apiKey', 'enabled'], parse: parseBoolean },
  { variable: 'AUTH__API_KEY__HEADER_NAME', path: ['apiKey', 'headerName'], parse: parseString },
  { variable: 'AUTH__API_KEY__MAX_PER_OWNER', path: ['apiKey', 'maxPerOwner'], parse: parseInteger },
  {
    variable: 'AUTH__API_KEY__DEFAULT_EXPIRATION_DAYS',
    path: ['apiKey', 'defaultExpirationDays'],
    parse: parseInteger,
  },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
  let node = target;
  for (const segment of path.slice(0, -1)) {
    const child = node[segment];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[segment] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

// ============================================================================
// ConfigManager
// ============================================================================

export interface ConfigManagerOptions {
  /** AuditService instance for logging secret access */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  /** Environment to read AUTH_CONFIG_PATH, overrides and secrets from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads AuthSettings from an optional JSON file.
 *
 * Order: read file → resolve `{"$secret": "NAME"}` descriptors → apply
 * `AUTH__*` overrides → validate with zod.
 *
 * @example
 * ```typescript
 * const manager = new ConfigManager();
 * const settings = await manager.loadConfig('./config/auth.json');
 * ```
 */
export class ConfigManager {
  private config: AuthSettings | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options.auditService,
      failFast: true,
    });

    // 1. Mounted secrets (production)
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    // 2. Environment (development/test)
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<AuthSettings> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.AUTH_CONFIG_PATH;
    const rawConfig = path ? await this.readConfigFile(path) : {};

    console.log('[ConfigManager] Resolving secrets...');
    try {
      await this.secretResolver.resolveSecrets(rawConfig);
    } catch (error) {
      throw new ConfigurationError(error instanceof Error ? error.message : 'Secret resolution failed');
    }

    this.applyEnvOverrides(rawConfig);

    const result = AuthSettingsSchema.safeParse(rawConfig);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new ConfigurationError(`Invalid auth settings (${issues.join('; ')})`, {
        issues,
      });
    }

    this.config = result.data;
    console.log('[ConfigManager] Configuration loaded and validated successfully', {
      source: path ?? 'defaults',
      jwt: this.config.jwt.enabled,
      apiKey: this.config.apiKey.enabled,
      blacklist: this.config.jwt.blacklist.backend,
    });
    return this.config;
  }

  getConfig(): AuthSettings {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<AuthSettings> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  private async readConfigFile(path: string): Promise<Record<string, unknown>> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration file ${path}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      throw new ConfigurationError(`Configuration file ${path} is not valid JSON`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Configuration file ${path} must contain a JSON object`);
    }
    return parsed;
  }

  private applyEnvOverrides(rawConfig: Record<string, unknown>): void {
    for (const override of ENV_OVERRIDES) {
      const raw = this.env[override.variable];
      if (raw === undefined || raw === '') {
        continue;
      }
      setPath(rawConfig, override.path, override.parse(raw, override.variable));
    }
  }
}
