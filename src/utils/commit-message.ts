import { DEFAULT_CONFIG } from "../constants";

/**
 * UTC timestamp at seconds precision, e.g. `2024-05-01T12:30:05Z`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function formatCommitMessage(template: string, timestamp: string): string {
  return template.split(DEFAULT_CONFIG.TIMESTAMP_PLACEHOLDER).join(timestamp);
}
