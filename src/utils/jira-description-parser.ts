/**
 * Plain text of a description; API v2 returns wiki markup as a string
 */
export const descriptionText = (
  description: string | null | undefined
): string => description?.trim() || "No description";
