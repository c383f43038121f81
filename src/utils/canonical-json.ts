import { createHash } from "crypto";

const normalise = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(normalise);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = normalise(entry);
      }
    }
    return sorted;
  }
  return value;
};

/**
 * JSON with object keys sorted at every depth, so equal values always
 * serialise to the same bytes.
 */
export const canonicalJson = (value: unknown): string =>
  JSON.stringify(normalise(value));

export const sha256Hex = (data: string | Buffer): string =>
  createHash("sha256").update(data).digest("hex");
