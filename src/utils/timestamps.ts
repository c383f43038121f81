/**
 * Interpret epoch milliseconds, numeric strings and ISO-8601 strings as
 * epoch milliseconds. Returns undefined for anything else.
 */
export const parseTimestamp = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? undefined : time;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const trimmed = value.trim();
    if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
      return Number(trimmed);
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

/**
 * Field names treated as timestamps during field-level merges
 */
export const isTimestampField = (field: string): boolean => {
  const lower = field.toLowerCase();
  return (
    lower.includes("timestamp") ||
    lower.includes("modified") ||
    lower.includes("date")
  );
};
