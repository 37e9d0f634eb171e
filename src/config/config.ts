import { JiraConfig, getJiraConfig } from "./jira.config";
import { ReportConfig, getReportConfig } from "./report.config";
import { AppConfig, getAppConfig } from "./app.config";
import { ConfigurationError } from "../utils/errors";

/**
 * Complete application configuration
 */
export interface Config {
  readonly jira: JiraConfig;
  readonly report: ReportConfig;
  readonly app: AppConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { JiraConfig, ReportConfig, AppConfig };

/**
 * Builds the complete configuration once. The result is frozen and
 * handed to each service explicitly.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return Object.freeze({
    jira: Object.freeze(getJiraConfig(env)),
    report: Object.freeze(getReportConfig(env)),
    app: Object.freeze(getAppConfig(env)),
  });
}

/**
 * Loads configuration, rewording failures so they point at the .env file
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return getConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
