// Pure HTTP utility functions
// All functions are pure - no side effects

/**
 * Build URL from base URL and endpoint.
 * An empty endpoint or '/' targets the base URL itself, which is how every Kuda service type is addressed.
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

const SENSITIVE_QUERY_PARAMS = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

/**
 * Sanitize URL for logging (mask sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    for (const param of SENSITIVE_QUERY_PARAMS) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Copy a Headers instance into a plain record with lower-cased names.
 */
export const headersToRecord = (headers: Headers): Record<string, string> => {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name.toLowerCase()] = value;
  });
  return record;
};

/**
 * Cut a body down for error messages and logs.
 */
export const truncateBody = (text: string, maxLength = 500): string =>
  text.length <= maxLength ? text : `${text.slice(0, maxLength)}…`;

/**
 * Whether a response carries no body to parse.
 */
export const isEmptyBody = (status: number, contentLength: string | null, text: string): boolean =>
  status === 204 || contentLength === '0' || text.trim() === '';
