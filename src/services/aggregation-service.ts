import {
  FieldMap,
  IssueRecord,
  IssueRole,
  JiraIssue,
  JiraUser,
  Tally,
  WrappedSummary,
} from "../types";
import { descriptionText } from "../utils/jira-description-parser";
import {
  EPIC_LINK_FIELD,
  EPIC_NAME_FIELD,
  UNSET_BUCKET,
  renderFieldValue,
} from "../utils/field-values";

/**
 * Inputs for a single aggregation run
 */
export interface AggregationOptions {
  /** Jira username the report is for */
  username: string;
  /** Tracked custom field names mapped to their ids */
  fieldMap: FieldMap;
  /** Project keys to keep; empty keeps every project */
  projectFilter: readonly string[];
  /** Days of history covered */
  timelineDays: number;
  /** First day of the window, `YYYY-MM-DD` */
  since: string;
  /** Epic key → epic name, for resolving "Epic Name" through "Epic Link" */
  epicNames?: ReadonlyMap<string, string>;
}

/**
 * Project key of an issue, falling back to its key prefix
 */
export function projectOf(issue: JiraIssue): string {
  return issue.fields.project?.key ?? issue.key.split("-")[0];
}

/**
 * Groups records by a key. Null keys land in the unset bucket.
 * Buckets are ordered by count descending, then key.
 */
export function tally(
  records: IssueRecord[],
  keyOf: (record: IssueRecord) => string | null
): Tally {
  const buckets = new Map<string, string[]>();

  records.forEach((record) => {
    const key = keyOf(record) ?? UNSET_BUCKET;
    const issueKeys = buckets.get(key) ?? [];
    issueKeys.push(record.key);
    buckets.set(key, issueKeys);
  });

  return [...buckets.entries()]
    .map(([key, issueKeys]) => ({ key, count: issueKeys.length, issueKeys }))
    .sort(
      (a, b) =>
        b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0)
    );
}

/**
 * Service responsible for turning fetched issues into report tallies
 */
export class AggregationService {
  /**
   * Filters issues by project and builds every tally of the report
   */
  aggregate(issues: JiraIssue[], options: AggregationOptions): WrappedSummary {
    const allowedProjects = new Set(options.projectFilter);
    const records = issues
      .filter(
        (issue) =>
          allowedProjects.size === 0 || allowedProjects.has(projectOf(issue))
      )
      .map((issue) => this.toRecord(issue, options));

    const byField: Record<string, Tally> = {};
    options.fieldMap.forEach((_id, name) => {
      byField[name] = tally(records, (record) => record.customFields[name]);
    });

    return {
      user: options.username,
      timelineDays: options.timelineDays,
      since: options.since,
      total: records.length,
      completed: records.filter((record) => record.completed).length,
      issues: records,
      byProject: tally(records, (record) => record.project),
      byStatus: tally(records, (record) => record.status),
      byIssueType: tally(records, (record) => record.issueType),
      byRole: tally(records, (record) => record.role),
      byField,
      epics: this.collectEpics(records, options.fieldMap),
    };
  }

  /**
   * Distinct epic names in first-encounter order
   */
  private collectEpics(records: IssueRecord[], fieldMap: FieldMap): string[] {
    if (!fieldMap.has(EPIC_NAME_FIELD)) {
      return [];
    }

    const epics = new Set<string>();
    records.forEach((record) => {
      const epicName = record.customFields[EPIC_NAME_FIELD];
      if (epicName !== null) {
        epics.add(epicName);
      }
    });
    return [...epics];
  }

  /**
   * Flattens a raw Jira issue into the fields the report uses
   */
  private toRecord(issue: JiraIssue, options: AggregationOptions): IssueRecord {
    const { fields } = issue;

    return {
      key: issue.key,
      project: projectOf(issue),
      status: fields.status?.name ?? UNSET_BUCKET,
      issueType: fields.issuetype?.name ?? UNSET_BUCKET,
      summary: fields.summary ?? "",
      description: descriptionText(fields.description),
      assignee: fields.assignee ? fields.assignee.displayName : "Unassigned",
      reporter: fields.reporter ? fields.reporter.displayName : "Unknown",
      created: fields.created ?? null,
      updated: fields.updated ?? null,
      resolved: fields.resolutiondate ?? null,
      role: this.roleOf(issue, options.username),
      completed: this.isCompleted(issue),
      customFields: this.customFieldValues(issue, options),
    };
  }

  private customFieldValues(
    issue: JiraIssue,
    { fieldMap, epicNames }: AggregationOptions
  ): Record<string, string | null> {
    const values: Record<string, string | null> = {};

    fieldMap.forEach((fieldId, name) => {
      const ownValue = renderFieldValue(issue.fields[fieldId]);

      if (name === EPIC_NAME_FIELD) {
        // Linked epic first; an epic itself carries its own name
        const linkId = fieldMap.get(EPIC_LINK_FIELD);
        const epicKey = linkId ? renderFieldValue(issue.fields[linkId]) : null;
        const linkedName = epicKey ? epicNames?.get(epicKey) ?? null : null;
        values[name] = linkedName ?? ownValue;
        return;
      }

      values[name] = ownValue;
    });

    return values;
  }

  /**
   * Checks if an issue is in the done status category
   */
  private isCompleted(issue: JiraIssue): boolean {
    const status = issue.fields.status;
    if (!status) {
      return false;
    }
    if (status.statusCategory?.key) {
      return status.statusCategory.key === "done";
    }
    return status.name.toLowerCase() === "done";
  }

  private roleOf(issue: JiraIssue, username: string): IssueRole {
    const assigned = isUser(issue.fields.assignee, username);
    const reported = isUser(issue.fields.reporter, username);

    if (assigned && reported) {
      return "assignee & reporter";
    }
    if (assigned) {
      return "assignee";
    }
    return reported ? "reporter" : "other";
  }
}

function isUser(user: JiraUser | null | undefined, username: string): boolean {
  if (!user) {
    return false;
  }
  const wanted = username.toLowerCase();
  return [user.name, user.key, user.emailAddress].some(
    (candidate) => candidate?.toLowerCase() === wanted
  );
}
