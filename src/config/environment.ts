import type { LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
  bindHost: string;
  dataDir: string;
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logJson: false,
  bindHost: '0.0.0.0',
  dataDir: 'data',
};

/**
 * Returns the static environment configuration (ENV overrides are not supported;
 * persistent overrides live in data/config.json).
 */
export function loadEnvironment(): EnvironmentConfig {
  return { ...DEFAULT_ENVIRONMENT };
}
