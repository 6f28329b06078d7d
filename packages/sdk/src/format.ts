/**
 * Deterministic JSON formatting for snapshots and crumbs
 */

/**
 * Field order used when writing records, so diffs of a snapshot stay readable
 */
export const RECORD_KEY_ORDER = [
  "version",
  "records",
  "messageId",
  "group",
  "date",
  "sender",
  "subject",
  "recipients",
  "role",
  "addresses",
  "references",
  "inReplyTo",
  "displayLine",
];

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit array (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(
  obj: unknown,
  indent = 2,
  order: "alpha" | string[] = "alpha"
): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a.localeCompare(b);
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return a.localeCompare(b);
  };

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays keep their order
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        const entries = Object.entries(value).sort(([a], [b]) => sorter(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}
