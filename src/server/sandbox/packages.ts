/**
 * Package allowlist matching for pip requirement specs
 */

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)(?:\[[^\]]*\])?(?:[<>=!~;@].*)?$/;

/**
 * Normalized distribution name (lowercase, runs of `-_.` collapsed to `-`)
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Base name of a requirement spec: `pandas>=1.0,<2.0` -> `pandas`.
 * Returns null for anything that is not a plain requirement.
 */
export function requirementName(spec: string): string | null {
  const trimmed = spec.trim();
  if (!trimmed || /\s/.test(trimmed)) {
    return null;
  }
  const match = NAME_PATTERN.exec(trimmed);
  return match ? normalizePackageName(match[1]) : null;
}

export function isPackageAllowed(spec: string, allowed: readonly string[]): boolean {
  const name = requirementName(spec);
  if (!name) return false;
  return allowed.some((entry) => normalizePackageName(entry.trim()) === name);
}
