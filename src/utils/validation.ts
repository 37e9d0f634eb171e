/**
 * Validation utilities for configuration and inputs
 */

import { ConfigurationError } from "./errors";

/**
 * Strings accepted as a true boolean flag
 */
const TRUTHY_VALUES = new Set([
  "true",
  "1",
  "t",
  "y",
  "yes",
  "yeah",
  "yup",
  "certainly",
  "uh-huh",
  "alright",
  "okay",
]);

/**
 * Validates Jira URL format
 */
export function isValidJiraUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === "http:" || parsed.protocol === "https:") &&
      parsed.hostname.length > 0
    );
  } catch {
    return false;
  }
}

/**
 * Validates that a string is not empty after trimming
 */
export function isNonEmptyString(value: string): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Validates required environment variable
 */
export function validateRequired(
  name: string,
  value: string | undefined
): string {
  if (!value || !isNonEmptyString(value)) {
    throw new ConfigurationError(
      `Missing required environment variable: ${name}\n` +
        `Please add this to your .env file. See .env.example for reference.`
    );
  }
  return value.trim();
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value.trim() : defaultValue;
}

/**
 * Interprets a yes/no style flag
 */
export function parseBoolean(
  value: string | undefined,
  defaultValue: boolean
): boolean {
  if (!value || !isNonEmptyString(value)) {
    return defaultValue;
  }
  return TRUTHY_VALUES.has(value.trim().toLowerCase());
}

/**
 * Parses an integer environment variable and checks its bounds
 */
export function parseInteger(
  name: string,
  value: string | undefined,
  defaultValue: number,
  { min = 1, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {}
): number {
  const raw = getOptional(value, String(defaultValue));

  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(
      `Invalid ${name}: ${raw}\n` +
        `Expected an integer (default: ${defaultValue})`
    );
  }

  const parsed = parseInt(raw, 10);
  if (parsed < min || parsed > max) {
    throw new ConfigurationError(
      `Invalid ${name}: ${raw}\n` +
        `Expected an integer between ${min} and ${max} (default: ${defaultValue})`
    );
  }

  return parsed;
}

/**
 * Parses a list setting. Accepts `A, B`, `A,B` and `['A', "B"]`.
 * Duplicates keep their first position.
 */
export function parseList(value: string | undefined): string[] {
  if (!value || !isNonEmptyString(value)) {
    return [];
  }

  const body = value.trim().replace(/^\[/, "").replace(/\]$/, "");
  const items = body
    .split(",")
    .map((item) => item.trim().replace(/^["']|["']$/g, "").trim())
    .filter((item) => item.length > 0);

  return [...new Set(items)];
}
