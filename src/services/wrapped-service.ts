import { JiraService, BASE_ISSUE_FIELDS, anchorDate, buildWrappedJql } from "./jira-service";
import { FieldService } from "./field-service";
import { AggregationService } from "./aggregation-service";
import type { Config } from "../config/config";
import type { FieldMap, JiraIssue, WrappedSummary } from "../types";
import { Logger, silentLogger } from "../utils/logger";

/**
 * Service responsible for orchestrating the wrapped report
 * Coordinates between Jira, Field and Aggregation services
 */
export class WrappedService {
  constructor(
    private readonly config: Config,
    private readonly jiraService: JiraService,
    private readonly fieldService: FieldService,
    private readonly aggregationService: AggregationService,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Maps the configured custom field names to field ids
   */
  async resolveFields(): Promise<FieldMap> {
    const { importantCustomFields, listCustomFields } = this.config.report;
    return this.fieldService.resolve(importantCustomFields, {
      listFields: listCustomFields,
    });
  }

  /**
   * Fetches every issue of the user inside the reporting window
   */
  async fetchIssues(fieldMap: FieldMap): Promise<JiraIssue[]> {
    const jql = buildWrappedJql({
      username: this.config.jira.username,
      timelineDays: this.config.report.timelineDays,
      projectFilter: this.config.jira.projectFilter,
      now: this.now(),
    });

    const issues = await this.jiraService.searchIssues(jql, [
      ...BASE_ISSUE_FIELDS,
      ...fieldMap.values(),
    ]);
    this.logger.debug(`Fetched ${issues.length} issues`);
    return issues;
  }

  /**
   * Looks up epic names for the fetched issues
   */
  async resolveEpics(
    issues: JiraIssue[],
    fieldMap: FieldMap
  ): Promise<Map<string, string>> {
    return this.fieldService.resolveEpicNames(issues, fieldMap);
  }

  /**
   * Builds the summary from already fetched data
   */
  summarize(
    issues: JiraIssue[],
    fieldMap: FieldMap,
    epicNames: ReadonlyMap<string, string> = new Map()
  ): WrappedSummary {
    return this.aggregationService.aggregate(issues, {
      username: this.config.jira.username,
      fieldMap,
      projectFilter: this.config.jira.projectFilter,
      timelineDays: this.config.report.timelineDays,
      since: anchorDate(this.config.report.timelineDays, this.now()),
      epicNames,
    });
  }

  /**
   * Runs the whole pipeline. Any failed request aborts before aggregation.
   */
  async generate(): Promise<WrappedSummary> {
    const fieldMap = await this.resolveFields();
    const issues = await this.fetchIssues(fieldMap);
    const epicNames = await this.resolveEpics(issues, fieldMap);
    return this.summarize(issues, fieldMap, epicNames);
  }
}
