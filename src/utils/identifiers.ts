const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const URL_PATTERN = /^\s*[A-Za-z][A-Za-z0-9+.-]*:\/\//;

/**
 * PEP 503 normalization: case-insensitive, with runs of "-", "_" and "."
 * treated as a single "-".
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Distribution name of a PEP 508 specifier, e.g. `requests` for
 * `requests[socks]>=2.31; python_version > "3.8"`. Returns null for bare
 * paths and URLs, which carry no name until the resolver builds them.
 */
export function requirementName(specifier: string): string | null {
  const trimmed = specifier.trim();
  if (trimmed.startsWith('.') || trimmed.startsWith('/')) return null;
  if (URL_PATTERN.test(trimmed)) return null;

  const match = NAME_PATTERN.exec(trimmed);
  return match ? match[1] : null;
}

export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}
