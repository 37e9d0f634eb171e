/**
 * Rendering of loosely-typed Jira field values into group keys
 */

export const EPIC_LINK_FIELD = "Epic Link";
export const EPIC_NAME_FIELD = "Epic Name";

/**
 * Bucket for issues without a value
 */
export const UNSET_BUCKET = "(unset)";

/**
 * Renders a field value as a string, or null when it is empty.
 * Option objects render by `value`, `name`, `displayName` or `key`;
 * arrays render element-wise joined with ", ".
 */
export function renderFieldValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "string") {
    return value.trim() === "" ? null : value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  if (Array.isArray(value)) {
    const items = value
      .map((item) => renderFieldValue(item))
      .filter((item): item is string => item !== null);
    return items.length > 0 ? items.join(", ") : null;
  }

  if (typeof value === "object") {
    for (const property of ["value", "name", "displayName", "key"]) {
      if (property in value) {
        const rendered = renderFieldValue(Reflect.get(value, property));
        if (rendered !== null) {
          return rendered;
        }
      }
    }
    return JSON.stringify(value);
  }

  return String(value);
}
