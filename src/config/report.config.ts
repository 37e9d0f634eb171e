import { getOptional, parseBoolean, parseInteger, parseList } from "../utils/validation";

/** Upper bound of the window; anything larger is not a representable date */
export const MAX_TIMELINE_DAYS = 36500;

/**
 * What the wrapped report covers and how it is printed
 */
export interface ReportConfig {
  /** Number of days of history to summarize */
  readonly timelineDays: number;
  /** Human-readable custom field names to track */
  readonly importantCustomFields: readonly string[];
  /** Print a detail block for every issue */
  readonly verbose: boolean;
  /** Print every custom field the instance defines */
  readonly listCustomFields: boolean;
  /** Wrap width for detail lines and separators */
  readonly lineLength: number;
}

/**
 * Retrieves report settings from environment variables
 */
export function getReportConfig(
  env: NodeJS.ProcessEnv = process.env
): ReportConfig {
  return {
    timelineDays: parseInteger("WRAPPED_TIMELINE", env.WRAPPED_TIMELINE, 5, {
      max: MAX_TIMELINE_DAYS,
    }),
    importantCustomFields: parseList(
      getOptional(env.IMPORTANT_CUSTOM_FIELDS, "")
    ),
    verbose: parseBoolean(env.VERBOSE, true),
    listCustomFields: parseBoolean(env.LIST_CUSTOM_FIELDS, false),
    lineLength: parseInteger(
      "FILE_LOG_LINE_LENGTH",
      env.FILE_LOG_LINE_LENGTH,
      120,
      { min: 20 }
    ),
  };
}
