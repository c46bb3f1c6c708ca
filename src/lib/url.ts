const TRACKING_PARAM_PATTERN = /^(utm_|fbclid$|gclid$|mc_cid$|mc_eid$)/i;

/** Resolves `input` against `base` and returns an absolute http(s) URL, or null. */
export function resolveUrl(input: string, base?: string): string | null {
  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return null;
  }

  if (!(parsed.protocol === "http:" || parsed.protocol === "https:")) {
    return null;
  }
  return parsed.toString();
}

/**
 * Canonical form used when a page has no native product id: lowercase host, no
 * fragment, no default port, no tracking parameters, sorted query, no trailing slash.
 */
export function normalizeUrl(input: string, base?: string): string | null {
  const resolved = resolveUrl(input, base);
  if (!resolved) {
    return null;
  }

  const parsed = new URL(resolved);
  parsed.hash = "";
  parsed.hostname = parsed.hostname.toLowerCase();

  if ((parsed.protocol === "http:" && parsed.port === "80") || (parsed.protocol === "https:" && parsed.port === "443")) {
    parsed.port = "";
  }

  const keptParams: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams.entries()) {
    if (!TRACKING_PARAM_PATTERN.test(key)) {
      keptParams.push([key, value]);
    }
  }

  keptParams.sort(([aKey, aValue], [bKey, bValue]) => {
    if (aKey === bKey) {
      return aValue.localeCompare(bValue);
    }
    return aKey.localeCompare(bKey);
  });

  parsed.search = "";
  for (const [key, value] of keptParams) {
    parsed.searchParams.append(key, value);
  }

  let pathname = parsed.pathname.replace(/\/+/g, "/");
  if (pathname !== "/") {
    pathname = pathname.replace(/\/+$/, "");
  }
  parsed.pathname = pathname;

  return parsed.toString();
}

/** True when `url` lies strictly below `prefixUrl` (the prefix itself does not count). */
export function isStrictlyUnder(url: string, prefixUrl: string): boolean {
  return url.startsWith(prefixUrl) && url !== prefixUrl;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
