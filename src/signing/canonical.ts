/**
 * Canonical request construction for Signature V4
 */

const encoder = new TextEncoder();

/**
 * URI encode following S3 requirements (RFC 3986 unreserved set).
 * Different from encodeURIComponent, which leaves `!'()*` alone.
 */
export function uriEncode(str: string, encodeSlash = true): string {
  let encoded = '';
  for (const char of str) {
    if (/^[A-Za-z0-9\-_.~]$/.test(char)) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
      }
    }
  }
  return encoded;
}

/**
 * Canonical URI of a raw (unencoded) path. Slashes are kept as they are,
 * empty segments included: object keys may legitimately contain `//`.
 */
export function canonicalUri(path: string): string {
  if (path === '') {
    return '/';
  }
  const normalized = path.startsWith('/') ? path : `/${path}`;
  return uriEncode(normalized, false);
}

/**
 * Canonical query string of raw name/value pairs: each side encoded once,
 * pairs sorted by name then value.
 *
 * @example
 * ```typescript
 * canonicalQueryString([['prefix', 'a b'], ['list-type', '2']]);
 * // 'list-type=2&prefix=a%20b'
 * ```
 */
export function canonicalQueryString(params: ReadonlyArray<readonly [string, string]>): string {
  return params
    .map(([name, value]): [string, string] => [uriEncode(name), uriEncode(value)])
    .sort((a, b) => {
      if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
      if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
      return 0;
    })
    .map(([name, value]) => `${name}=${value}`)
    .join('&');
}

/**
 * Canonical request:
 * METHOD\n CANONICAL_URI\n CANONICAL_QUERY\n CANONICAL_HEADERS\n SIGNED_HEADERS\n PAYLOAD_HASH
 */
export function createCanonicalRequest(
  method: string,
  uri: string,
  query: string,
  headers: Readonly<Record<string, string>>,
  payloadHash: string
): string {
  const names = Object.keys(headers)
    .map((name) => name.toLowerCase())
    .sort();
  const lowered = new Map(
    Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value.trim().replace(/\s+/g, ' ')])
  );
  const canonicalHeaders = names.map((name) => `${name}:${lowered.get(name) ?? ''}\n`).join('');

  return [method.toUpperCase(), uri, query, canonicalHeaders, names.join(';'), payloadHash].join('\n');
}
