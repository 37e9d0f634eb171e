/**
 * Type definitions for Jira Wrapped
 */

// ============================================
// Jira API Types
// ============================================

/**
 * Jira user as returned by the Server / Data Center API
 */
export interface JiraUser {
  name?: string;
  key?: string;
  emailAddress?: string;
  displayName: string;
}

/**
 * Raw Jira issue from API. Custom fields arrive under their
 * `customfield_*` ids with instance-specific shapes.
 */
export interface JiraIssue {
  key: string;
  fields: {
    summary?: string;
    description?: string | null;
    project?: { key: string; name?: string };
    status?: { name: string; statusCategory?: { key: string } };
    issuetype?: { name: string };
    assignee?: JiraUser | null;
    reporter?: JiraUser | null;
    created?: string;
    updated?: string;
    resolutiondate?: string | null;
    [fieldId: string]: unknown;
  };
}

/**
 * One page of `/rest/api/2/search`
 */
export interface JiraSearchResponse {
  startAt: number;
  maxResults: number;
  total: number;
  issues: JiraIssue[];
}

/**
 * Field definition from `/rest/api/2/field`
 */
export interface JiraField {
  id: string;
  name: string;
  custom: boolean;
}

/**
 * Human-readable custom field name to field id, in configured order
 */
export type FieldMap = ReadonlyMap<string, string>;

// ============================================
// Report Types
// ============================================

/**
 * How the reporting user relates to an issue
 */
export type IssueRole = "assignee & reporter" | "assignee" | "reporter" | "other";

/**
 * Flattened issue as used by the report
 */
export interface IssueRecord {
  key: string;
  project: string;
  status: string;
  issueType: string;
  summary: string;
  description: string;
  assignee: string;
  reporter: string;
  created: string | null;
  updated: string | null;
  resolved: string | null;
  role: IssueRole;
  completed: boolean;
  /** Tracked custom field name to rendered value (null when unset) */
  customFields: Record<string, string | null>;
}

/**
 * Issues sharing one group key
 */
export interface TallyBucket {
  key: string;
  count: number;
  issueKeys: string[];
}

/**
 * Buckets ordered by count descending, then key
 */
export type Tally = TallyBucket[];

/**
 * Everything the reporter prints
 */
export interface WrappedSummary {
  user: string;
  timelineDays: number;
  since: string;
  total: number;
  completed: number;
  issues: IssueRecord[];
  byProject: Tally;
  byStatus: Tally;
  byIssueType: Tally;
  byRole: Tally;
  /** One tally per tracked custom field, in configured order */
  byField: Record<string, Tally>;
  epics: string[];
}
