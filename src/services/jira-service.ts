import axios, { AxiosInstance } from "axios";
import { JiraConfig } from "../config/config";
import { JiraField, JiraIssue, JiraSearchResponse } from "../types";
import { AuthError, RequestError } from "../utils/errors";
import { Logger, silentLogger } from "../utils/logger";

const DAY_MS = 1000 * 60 * 60 * 24;

/**
 * Fields requested for every issue besides the tracked custom fields
 */
export const BASE_ISSUE_FIELDS = [
  "summary",
  "description",
  "project",
  "status",
  "issuetype",
  "assignee",
  "reporter",
  "created",
  "updated",
  "resolutiondate",
];

/**
 * Parameters for building the wrapped JQL query
 */
export interface WrappedJqlParams {
  /** Jira username whose issues are reported */
  username: string;
  /** Days of history to include */
  timelineDays: number;
  /** Project keys; empty means every project */
  projectFilter: readonly string[];
  /** Reference time (defaults to now) */
  now?: Date;
}

/**
 * First day of the reporting window as `YYYY-MM-DD` (UTC)
 */
export function anchorDate(timelineDays: number, now: Date = new Date()): string {
  return new Date(now.getTime() - timelineDays * DAY_MS)
    .toISOString()
    .split("T")[0];
}

/**
 * Quotes a value for use inside a JQL string literal
 */
export function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Builds the JQL for every issue the user was assigned or reported,
 * updated within the window, optionally limited to some projects
 */
export function buildWrappedJql({
  username,
  timelineDays,
  projectFilter,
  now,
}: WrappedJqlParams): string {
  const user = quoteJql(username);
  const clauses = [
    `(assignee = ${user} OR reporter = ${user})`,
    `updated >= ${quoteJql(anchorDate(timelineDays, now))}`,
  ];

  if (projectFilter.length > 0) {
    clauses.push(`project in (${projectFilter.map(quoteJql).join(", ")})`);
  }

  return `${clauses.join(" AND ")} ORDER BY updated DESC`;
}

/**
 * Service class for interacting with the Jira REST API (v2)
 */
export class JiraService {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: JiraConfig,
    private readonly logger: Logger = silentLogger,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: `${this.config.url}/rest/api/2`,
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: "application/json",
        },
      });
  }

  /**
   * Runs a JQL search and follows pagination until Jira's reported
   * total is reached. A failing page aborts the whole search.
   * @param jql - JQL (Jira Query Language) string to filter issues
   * @param fields - Field ids to return for each issue
   */
  async searchIssues(jql: string, fields: string[]): Promise<JiraIssue[]> {
    const allIssues: JiraIssue[] = [];
    let startAt = 0;
    let total = 0;

    this.logger.debug(`JQL: ${jql}`);

    do {
      const page = await this.get<JiraSearchResponse>("/search", {
        jql,
        startAt,
        maxResults: this.config.pageSize,
        fields: fields.join(","),
      });

      total = page.total;
      allIssues.push(...page.issues);
      this.logger.debug(
        `Fetched ${page.issues.length} issues at ${startAt} (${allIssues.length}/${total})`
      );

      if (page.issues.length === 0) {
        break;
      }
      startAt += page.issues.length;
    } while (startAt < total);

    return allIssues;
  }

  /**
   * Fetches every field definition of the instance
   */
  async fetchFields(): Promise<JiraField[]> {
    return this.get<JiraField[]>("/field");
  }

  /**
   * Fetches a single issue with the given fields
   */
  async fetchIssue(key: string, fields: string[]): Promise<JiraIssue> {
    return this.get<JiraIssue>(`/issue/${encodeURIComponent(key)}`, {
      fields: fields.join(","),
    });
  }

  private async get<T>(
    path: string,
    params?: Record<string, string | number>
  ): Promise<T> {
    try {
      const response = await this.http.get<T>(path, { params });
      return response.data;
    } catch (error) {
      throw this.toRequestFailure(error, path);
    }
  }

  /**
   * Maps transport failures onto AuthError and RequestError
   */
  private toRequestFailure(error: unknown, path: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const status = error.response?.status ?? null;
    if (status === 401 || status === 403) {
      return new AuthError(
        `Jira rejected the token (HTTP ${status}). Check JIRA_TOKEN.`,
        status
      );
    }

    this.logger.debug(`Request to ${path} failed: ${error.message}`);
    return new RequestError(
      status === null
        ? `Jira request to ${path} failed: ${error.message}`
        : `Jira request to ${path} failed with HTTP ${status}`,
      status,
      path
    );
  }
}
