/**
 * Observability configuration with environment detection
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  level: LogLevel;
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
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

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();
  const requestedLevel = process.env.LOG_LEVEL?.toLowerCase();

  const config: ObservabilityConfig = {
    environment,
    level: environment === 'development' ? 'debug' : 'info',
    exporters: {
      console: environment === 'development',
    },
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'credential-vault',
      version: process.env.npm_package_version ?? '1.0.0',
    },
  };

  if (requestedLevel && isLogLevel(requestedLevel)) {
    config.level = requestedLevel;
  }

  if (environment === 'test') {
    config.level = 'silent';
    config.exporters.console = false;
  }

  return config;
}
