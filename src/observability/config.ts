/**
 * Logging configuration with environment detection
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  level: LogLevel | 'silent';
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
    namespace: string;
  };
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Get logging configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();
  const override = process.env.LOG_LEVEL;

  const config: ObservabilityConfig = {
    environment,
    level: environment === 'development' ? 'debug' : 'info',
    exporters: {
      // Pretty console output for local development only
      console: environment === 'development',
    },
    service: {
      name: 'guild-dashboard-edge',
      version: process.env.npm_package_version ?? '0.1.0',
      namespace: environment === 'production' ? 'prod' : 'dev',
    },
  };

  if (isLogLevel(override)) {
    config.level = override;
  }

  if (environment === 'test') {
    config.level = 'silent';
    config.exporters.console = false;
  }

  return config;
}
