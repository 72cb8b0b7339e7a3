/**
 * Environment configuration
 *
 * The environment is read and validated once, then converted into an
 * explicit {@link AppConfig} that is handed to every component. Nothing
 * below the entry point looks at `process.env` directly.
 */

import { z } from 'zod';
import { logger } from '../observability/logger.js';

export const DEFAULT_DISCORD_API_BASE_URL = 'https://discord.com/api/v10';
export const DEFAULT_DASHBOARD_URL = 'http://localhost:5173';
export const AUTH_REDIRECT_PATH = '/api/auth/redirect';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HTTP_PORT: z.number().int().min(0).max(65535).default(8787),
  HTTP_HOST: z.string().default('127.0.0.1'),
  DASHBOARD_URL: z.string().url().default(DEFAULT_DASHBOARD_URL),
  API_HOST: z.string().url().default('http://127.0.0.1:8787'),
  DISCORD_API_BASE_URL: z.string().url().default(DEFAULT_DISCORD_API_BASE_URL),
  UPSTREAM_TIMEOUT_MS: z.number().int().positive().default(10_000),
  GATEWAY_NAMESPACE: z.string().min(1).default('BOTROOM'),
  INSTANCE_NODES: z.string().optional(),
});

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = z.object({
  DISCORD_CLIENT_ID: z.string().min(1).optional(),
  DISCORD_CLIENT_SECRET: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
});

const SECRET_KEYS = ['DISCORD_CLIENT_ID', 'DISCORD_CLIENT_SECRET', 'DATABASE_URL'] as const;

export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

export interface OAuthClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Fully resolved application configuration
 */
export interface AppConfig {
  environment: Environment['NODE_ENV'];
  server: {
    port: number;
    host: string;
  };
  /** Dashboard base URL, no trailing slash */
  dashboardUrl: string;
  /** OAuth2 redirect URI registered with the provider */
  redirectUri: string;
  discord: {
    apiBaseUrl: string;
    /** Absent when either the client id or the client secret is not configured */
    credentials?: OAuthClientCredentials;
  };
  upstreamTimeoutMs: number;
  gateway: {
    namespace: string;
    nodes: string[];
  };
  databaseUrl?: string;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseInteger(value: string | undefined): number | undefined {
  const raw = blankToUndefined(value);
  return raw === undefined ? undefined : Number(raw);
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;

  /**
   * Load and validate environment configuration
   */
  static load(source: NodeJS.ProcessEnv = process.env): Environment {
    if (this._instance) {
      return this._instance;
    }

    const env = {
      NODE_ENV: blankToUndefined(source.NODE_ENV),
      HTTP_PORT: parseInteger(source.HTTP_PORT),
      HTTP_HOST: blankToUndefined(source.HTTP_HOST),
      DASHBOARD_URL: blankToUndefined(source.DASHBOARD_URL),
      API_HOST: blankToUndefined(source.API_HOST),
      DISCORD_API_BASE_URL: blankToUndefined(source.DISCORD_API_BASE_URL),
      UPSTREAM_TIMEOUT_MS: parseInteger(source.UPSTREAM_TIMEOUT_MS),
      GATEWAY_NAMESPACE: blankToUndefined(source.GATEWAY_NAMESPACE),
      INSTANCE_NODES: blankToUndefined(source.INSTANCE_NODES),

      DISCORD_CLIENT_ID: blankToUndefined(source.DISCORD_CLIENT_ID),
      DISCORD_CLIENT_SECRET: blankToUndefined(source.DISCORD_CLIENT_SECRET),
      DATABASE_URL: blankToUndefined(source.DATABASE_URL),
    };

    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
      logger.error('Environment configuration validation failed', { issues: parsed.error.issues });
      throw new Error('Invalid environment configuration');
    }

    this._instance = parsed.data;
    this._configStatus = this.analyzeConfiguration(parsed.data);
    return this._instance;
  }

  /**
   * Separate loggable configuration from secrets, keeping only secret names
   */
  private static analyzeConfiguration(env: Environment): ConfigurationStatus {
    const configuration = ConfigurationSchema.parse(env);
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of SECRET_KEYS) {
      if (env[key]) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: SECRET_KEYS.length
      }
    };
  }

  static get(): Environment {
    return this.load();
  }

  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    if (!this._configStatus) {
      throw new Error('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  static logConfiguration(): void {
    const status = this.getConfigurationStatus();

    logger.info('Configuration loaded', { configuration: status.configuration });
    logger.info('Secrets status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    if (!this.hasOAuthCredentials()) {
      logger.warn('OAuth: DISCORD_CLIENT_ID / DISCORD_CLIENT_SECRET not configured, login is disabled');
    }
  }

  static hasOAuthCredentials(): boolean {
    const { configured } = this.getConfigurationStatus().secrets;
    return configured.includes('DISCORD_CLIENT_ID') && configured.includes('DISCORD_CLIENT_SECRET');
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
  }

  static isProduction(): boolean {
    return this.get().NODE_ENV === 'production';
  }

  static isDevelopment(): boolean {
    return this.get().NODE_ENV === 'development';
  }

  /**
   * Build the explicit application configuration
   */
  static toAppConfig(env: Environment = this.get()): AppConfig {
    const apiHost = stripTrailingSlash(env.API_HOST);
    const credentials = env.DISCORD_CLIENT_ID && env.DISCORD_CLIENT_SECRET
      ? { clientId: env.DISCORD_CLIENT_ID, clientSecret: env.DISCORD_CLIENT_SECRET }
      : undefined;

    return {
      environment: env.NODE_ENV,
      server: {
        port: env.HTTP_PORT,
        host: env.HTTP_HOST,
      },
      dashboardUrl: stripTrailingSlash(env.DASHBOARD_URL),
      redirectUri: `${apiHost}${AUTH_REDIRECT_PATH}`,
      discord: {
        apiBaseUrl: stripTrailingSlash(env.DISCORD_API_BASE_URL),
        credentials,
      },
      upstreamTimeoutMs: env.UPSTREAM_TIMEOUT_MS,
      gateway: {
        namespace: env.GATEWAY_NAMESPACE,
        nodes: env.INSTANCE_NODES
          ? env.INSTANCE_NODES.split(',').map(node => stripTrailingSlash(node.trim())).filter(node => node.length > 0)
          : [],
      },
      databaseUrl: env.DATABASE_URL,
    };
  }
}
