export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function normalizeForDeterministicSerialization(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(normalizeForDeterministicSerialization);
  }

  if (value !== null && typeof value === "object") {
    const normalized: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      normalized[key] = normalizeForDeterministicSerialization(value[key]);
    }
    return normalized;
  }

  return value;
}

/** Key-sorted JSON with a trailing newline, so reports diff cleanly between runs. */
export function stringifyDeterministic(value: JsonValue, spacing = 2): string {
  return JSON.stringify(normalizeForDeterministicSerialization(value), null, spacing) + "\n";
}
