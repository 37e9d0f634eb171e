import chalk from "chalk";
import { JiraService } from "./jira-service";
import { FieldMap, JiraField, JiraIssue } from "../types";
import { FieldResolutionError } from "../utils/errors";
import { Logger, silentLogger } from "../utils/logger";
import {
  EPIC_LINK_FIELD,
  EPIC_NAME_FIELD,
  renderFieldValue,
} from "../utils/field-values";

/**
 * Options for resolving configured field names
 */
export interface ResolveFieldsOptions {
  /** Print every custom field of the instance before resolving */
  listFields?: boolean;
}

/**
 * Builds the name → id map for the configured custom fields.
 * Every unknown name is reported at once.
 */
export function buildFieldMap(
  fields: JiraField[],
  names: readonly string[]
): FieldMap {
  const idsByName = new Map(fields.map((field) => [field.name, field.id]));
  const fieldMap = new Map<string, string>();
  const unknown: string[] = [];

  names.forEach((name) => {
    const id = idsByName.get(name);
    if (id) {
      fieldMap.set(name, id);
    } else {
      unknown.push(name);
    }
  });

  if (unknown.length > 0) {
    throw new FieldResolutionError(
      `Unknown custom field(s): ${unknown.join(", ")}\n` +
        `Set LIST_CUSTOM_FIELDS=true to see every custom field available.`,
      unknown
    );
  }

  if (fieldMap.has(EPIC_NAME_FIELD) && !fieldMap.has(EPIC_LINK_FIELD)) {
    throw new FieldResolutionError(
      `"${EPIC_NAME_FIELD}" is resolved through "${EPIC_LINK_FIELD}". ` +
        `Add "${EPIC_LINK_FIELD}" to IMPORTANT_CUSTOM_FIELDS.`
    );
  }

  return fieldMap;
}

/**
 * Resolves human-readable custom field names and epic names
 */
export class FieldService {
  constructor(
    private readonly jiraService: JiraService,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Fetches the custom field definitions of the instance
   */
  async listCustomFields(): Promise<JiraField[]> {
    const fields = await this.jiraService.fetchFields();
    const customFields = fields.filter((field) => field.custom);
    this.logger.debug(`Number of Custom Fields: ${customFields.length}`);
    return customFields;
  }

  /**
   * Fetches the field definitions, optionally prints them, and maps the
   * configured names to field ids
   */
  async resolve(
    names: readonly string[],
    { listFields = false }: ResolveFieldsOptions = {}
  ): Promise<FieldMap> {
    const customFields = await this.listCustomFields();

    if (listFields) {
      displayCustomFields(customFields);
    }

    return buildFieldMap(customFields, names);
  }

  /**
   * Looks up the name of every epic linked from the issues. Each epic is
   * fetched once. Returns an empty map unless both epic fields are tracked.
   */
  async resolveEpicNames(
    issues: JiraIssue[],
    fieldMap: FieldMap
  ): Promise<Map<string, string>> {
    const epicNames = new Map<string, string>();
    const linkId = fieldMap.get(EPIC_LINK_FIELD);
    const nameId = fieldMap.get(EPIC_NAME_FIELD);

    if (!linkId || !nameId) {
      return epicNames;
    }

    for (const issue of issues) {
      const epicKey = renderFieldValue(issue.fields[linkId]);
      if (epicKey === null || epicNames.has(epicKey)) {
        continue;
      }

      const epic = await this.jiraService.fetchIssue(epicKey, [nameId]);
      const epicName = renderFieldValue(epic.fields[nameId]) ?? epicKey;
      this.logger.debug(`Epic ${epicKey}: ${epicName}`);
      epicNames.set(epicKey, epicName);
    }

    return epicNames;
  }
}

/**
 * Prints every custom field as `<id>  <name>`, sorted by name
 */
export function displayCustomFields(fields: JiraField[]): void {
  console.log("\n" + chalk.bold(`🧩 Custom Fields (${fields.length})`));

  [...fields]
    .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id))
    .forEach((field) => {
      console.log(`  ${chalk.gray(field.id)}  ${field.name}`);
    });
}
