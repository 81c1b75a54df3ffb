/**
 * Continuation token from a `Link` response header.
 *
 * Directives are comma separated, e.g.
 * `<https://shop.example/products.json?limit=250&page_info=PREV>; rel="previous", <...&page_info=NEXT>; rel="next"`.
 * Returns the `page_info` value of the `rel="next"` directive, or null when
 * the header is missing, has no next directive, or the next URL carries no
 * non-empty `page_info`.
 */
export function extractNextCursor(linkHeader: string | null | undefined): string | null {
  if (!linkHeader) return null;

  for (const rawSegment of linkHeader.split(',')) {
    const segment = rawSegment.trim();
    if (!segment.includes('rel="next"')) continue;

    const start = segment.indexOf('<');
    const end = segment.indexOf('>');
    if (start === -1 || end === -1 || start + 1 >= end) return null;

    return queryParam(segment.slice(start + 1, end), 'page_info');
  }

  return null;
}

// No percent-decoding: tokens are base64url.
function queryParam(url: string, name: string): string | null {
  const queryStart = url.indexOf('?');
  if (queryStart === -1) return null;

  const prefix = `${name}=`;
  for (const pair of url.slice(queryStart + 1).split('&')) {
    if (!pair.startsWith(prefix)) continue;
    const value = pair.slice(prefix.length).split('#')[0] ?? '';
    if (value.length > 0) return value;
  }
  return null;
}
