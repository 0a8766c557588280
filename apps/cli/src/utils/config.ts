import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';

export const DEFAULT_API_URL = 'http://localhost:8081';

export interface CliConfig {
  /** Base URL of the worker's HTTP API */
  apiUrl: string;
}

/**
 * Load CLI configuration from the environment and a .env file in the
 * working directory. An explicit `--api` option wins over both.
 */
export function loadConfig(apiOption?: string): CliConfig {
  loadDotenv({ path: resolve(process.cwd(), '.env') });

  return {
    apiUrl: apiOption || process.env.SLUICE_API_URL || DEFAULT_API_URL,
  };
}
