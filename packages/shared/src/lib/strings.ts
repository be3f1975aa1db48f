export function coerceTrimmedString(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

export function trimmedOrUndefined(value: unknown): string | undefined {
  const trimmed = coerceTrimmedString(value);
  return trimmed ? trimmed : undefined;
}

// Code-unit order, independent of the host locale.
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortedKeys<T>(map: ReadonlyMap<string, T>): string[] {
  return [...map.keys()].sort(compareStrings);
}

export function formatUnknown(value: unknown, fallback = ""): string {
  if (value instanceof Error) {
    const msg = value.message.trim();
    if (msg) return msg;
  }
  return coerceTrimmedString(value) || fallback;
}
