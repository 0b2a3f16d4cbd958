import { isNotBlank } from '../../common/strings.js';
import type { WebRequest } from '../../types/web.js';

export interface RequestTarget {
  path: string;
  /**
   * Raw text after the first `?`, kept undecoded.
   */
  queryString?: string;
}

/**
 * Splits a raw request target (`/a/b?x=1`) at its first `?`.
 */
export function splitRequestTarget(rawUrl: string | undefined): RequestTarget {
  if (rawUrl === undefined || rawUrl.length === 0) {
    return { path: '/' };
  }

  const queryStart = rawUrl.indexOf('?');
  if (queryStart === -1) {
    return { path: rawUrl };
  }

  return {
    path: rawUrl.slice(0, queryStart) || '/',
    queryString: rawUrl.slice(queryStart + 1),
  };
}

/**
 * Request URL including the query string, when there is a non-blank one.
 */
export function getFullRequestUrl(request: WebRequest): string {
  const requestUrl = request.getRequestUrl();
  const queryString = request.getQueryString();

  if (isNotBlank(queryString)) {
    return `${requestUrl}?${queryString}`;
  }

  return requestUrl;
}
