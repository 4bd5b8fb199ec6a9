const naturalOrder = new Intl.Collator(undefined, {
  numeric: true,
  sensitivity: "base",
});

/** Sorts version strings so that "v10" comes after "v2". */
export function sortVersions(versions: string[]): string[] {
  return [...versions].sort(naturalOrder.compare);
}

export function latestVersion(versions: string[]): string | undefined {
  const sorted = sortVersions(versions);
  return sorted[sorted.length - 1];
}

/** "v2" -> 2; NaN when the string carries no number. */
export function apiVersionNumber(version: string): number {
  return parseInt(version.replace(/^\/?v/i, ""), 10);
}

/**
 * Numeric release parts of a simulator version: "12.2.0-r1" -> [12, 2, 0].
 * Returns null when the string does not start with a number.
 */
export function releaseParts(version: string): number[] | null {
  const match = /^\d+(\.\d+)*/.exec(version.trim());
  if (!match) {
    return null;
  }
  return match[0].split(".").map((part) => parseInt(part, 10));
}

export function compareReleases(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export type VersionCheck = "below" | "within" | "above" | "unknown";

export function checkVersionRange(version: string, min: string, max: string): VersionCheck {
  const current = releaseParts(version);
  const lower = releaseParts(min);
  const upper = releaseParts(max);
  if (!current || !lower || !upper) {
    return "unknown";
  }
  if (compareReleases(current, lower) < 0) {
    return "below";
  }
  if (compareReleases(current, upper) > 0) {
    return "above";
  }
  return "within";
}
