import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface TraversalConfig {
  defaultMaxDepth: number;
}

export interface ClassificationConfig {
  rulesPath?: string;
}

export interface Config {
  logging: LoggingConfig;
  traversal: TraversalConfig;
  classification: ClassificationConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE,
  },
  traversal: {
    defaultMaxDepth: getEnvVarAsNumber('TYPE_GRAPH_MAX_DEPTH', 3),
  },
  classification: {
    rulesPath: process.env.TYPE_GRAPH_RULES_DIR,
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
