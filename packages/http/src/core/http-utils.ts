// Pure HTTP utility functions
// All functions are pure - no side effects

export type QueryValue = string | number | boolean;

/**
 * Percent-encode per RFC 3986. encodeURIComponent leaves !'()* alone,
 * those are encoded here as well.
 */
export const rawUrlEncode = (value: string): string =>
  encodeURIComponent(value).replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);

/**
 * Encode a query record into `key=value` pairs, keeping insertion order
 */
export const encodeQuery = (params: Readonly<Record<string, QueryValue>>): string[] =>
  Object.entries(params).map(([key, value]) => `${rawUrlEncode(key)}=${rawUrlEncode(String(value))}`);

/**
 * Append encoded query pairs to a URL, ahead of any fragment
 */
export const resolveTargetUrl = (url: string, query: readonly string[]): string => {
  if (query.length === 0) {
    return url;
  }

  const hashIndex = url.indexOf('#');
  const base = hashIndex === -1 ? url : url.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : url.slice(hashIndex);
  const separator = base.includes('?') ? '&' : '?';
  return `${base}${separator}${query.join('&')}${fragment}`;
};

export const isAbsoluteUrl = (url: string): boolean => {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
};

/**
 * Clamp a retry budget to a non-negative integer
 */
export const normalizeRetries = (retries: number): number =>
  Number.isFinite(retries) ? Math.max(0, Math.floor(retries)) : 0;

/**
 * Overlay request headers on defaults. Names compare case-insensitively;
 * a request header replaces any default with the same name.
 */
export const mergeHeaders = (
  defaults: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>>
): Record<string, string> => {
  const overridden = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));
  const merged: Record<string, string> = {};

  for (const [name, value] of Object.entries(defaults)) {
    if (!overridden.has(name.toLowerCase())) {
      merged[name] = value;
    }
  }

  return { ...merged, ...overrides };
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};
