import type { Variables } from "graphql-request";

/**
 * Fields whose values are arbitrary JSON documents. Their content, nulls
 * included, is sent exactly as given.
 */
export const DEFAULT_OPAQUE_JSON_FIELDS: readonly string[] = [
  "jsonContent",
  "jsonInterface",
  "jsonMetadata",
  "jsonResponse",
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFilterKey(key: string): boolean {
  return key === "where" || key.endsWith("Where");
}

function stripNulls(value: unknown, opaqueFields: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => stripNulls(item, opaqueFields));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (opaqueFields.has(key)) {
      cleaned[key] = entry;
      continue;
    }
    if (entry === null || entry === undefined) {
      continue;
    }
    cleaned[key] = stripNulls(entry, opaqueFields);
  }
  return cleaned;
}

function cleanValue(value: unknown, opaqueFields: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => cleanValue(item, opaqueFields));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const cleaned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (opaqueFields.has(key)) {
      cleaned[key] = entry;
    } else if (isFilterKey(key) && isPlainObject(entry)) {
      cleaned[key] = stripNulls(entry, opaqueFields);
    } else {
      cleaned[key] = cleanValue(entry, opaqueFields);
    }
  }
  return cleaned;
}

/**
 * Removes null and undefined entries from every `where`-style filter object
 * (a `where` key or a key ending in `Where`), at any depth. Values outside
 * filters keep their nulls so mutations can still clear a field.
 */
export function cleanVariables(
  variables: Variables | undefined,
  opaqueFields: readonly string[] = DEFAULT_OPAQUE_JSON_FIELDS
): Variables {
  if (variables === undefined) {
    return {};
  }
  const opaque = new Set(opaqueFields);
  const cleaned: Variables = {};
  for (const [key, value] of Object.entries(variables)) {
    if (opaque.has(key)) {
      cleaned[key] = value;
    } else if (isFilterKey(key) && isPlainObject(value)) {
      cleaned[key] = stripNulls(value, opaque);
    } else {
      cleaned[key] = cleanValue(value, opaque);
    }
  }
  return cleaned;
}
