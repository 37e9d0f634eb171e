import {
  validateRequired,
  isValidJiraUrl,
  parseInteger,
  parseList,
} from "../utils/validation";
import { ConfigurationError } from "../utils/errors";

/**
 * Jira API configuration
 */
export interface JiraConfig {
  readonly url: string;
  readonly token: string;
  /** Jira username the report is generated for */
  readonly username: string;
  /** Project keys to keep; empty means every project */
  readonly projectFilter: readonly string[];
  /** maxResults for each search page */
  readonly pageSize: number;
}

/**
 * Retrieves and validates Jira configuration from environment variables
 */
export function getJiraConfig(env: NodeJS.ProcessEnv = process.env): JiraConfig {
  const url = validateRequired("JIRA_URL", env.JIRA_URL);
  const token = validateRequired("JIRA_TOKEN", env.JIRA_TOKEN);
  const username = validateRequired("WHOAMI", env.WHOAMI);

  // Validate Jira URL format
  if (!isValidJiraUrl(url)) {
    throw new ConfigurationError(
      `Invalid JIRA_URL format: ${url}\n` +
        `Expected format: https://jira.your-company.com`
    );
  }

  const pageSize = parseInteger("JIRA_PAGE_SIZE", env.JIRA_PAGE_SIZE, 50, {
    min: 1,
    max: 1000,
  });

  return {
    url: url.replace(/\/+$/, ""),
    token,
    username,
    projectFilter: parseList(env.PROJECT_FILTER),
    pageSize,
  };
}
