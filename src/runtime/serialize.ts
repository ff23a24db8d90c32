/**
 * Anything `JSON.stringify` turns into a value through `toJSON`.
 */
export interface Serializable {
  toJSON(): Record<string, unknown>;
}

/**
 * Copy of `record` without the entries whose value is `undefined` or
 * `null`. Every model type builds its wire form through this, so unset
 * fields are left out instead of written as `null`.
 */
export function compact(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined && value !== null) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * The single line of JSON Alfred reads from a script filter, written with
 * `", "` and `": "` between entries.
 */
export function serialize(output: Serializable): string {
  const value: unknown = JSON.parse(JSON.stringify(output));
  return format(value);
}

function format(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(format).join(", ")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value).map(([key, entry]) => `${JSON.stringify(key)}: ${format(entry)}`);
    return `{${entries.join(", ")}}`;
  }
  return JSON.stringify(value);
}
