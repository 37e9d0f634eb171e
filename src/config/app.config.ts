import { parseBoolean } from "../utils/validation";

/**
 * Application configuration
 */
export interface AppConfig {
  readonly debug: boolean;
}

/**
 * Retrieves and validates application configuration from environment variables
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    debug: parseBoolean(env.DEBUG, true),
  };
}
