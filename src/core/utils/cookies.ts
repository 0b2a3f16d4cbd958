import { parse, serialize } from 'cookie';

import { DEFAULT_COOKIE_PATH } from '../../common/consts.js';
import { logJsonl } from '../../common/logger.js';
import { isBlank, isNotBlank } from '../../common/strings.js';
import type { Cookie, CookieOptions, FailureCookieOptions, WebRequest, WebResponse } from '../../types/web.js';

function resolveCookiePath(request: WebRequest, path: string | undefined): string {
  const candidate = path ?? request.getContextPath();
  return isBlank(candidate) ? DEFAULT_COOKIE_PATH : candidate;
}

export function findCookie(request: WebRequest | undefined, name: string): Cookie | undefined {
  if (request === undefined) {
    return undefined;
  }

  const cookies = request.getCookies();
  if (cookies === undefined || cookies.length === 0) {
    return undefined;
  }

  return cookies.find((cookie) => cookie.name === name);
}

export function findCookieValue(request: WebRequest | undefined, name: string): string | undefined {
  return findCookie(request, name)?.value ?? undefined;
}

/**
 * Builds a cookie from the request's context and attaches it to the response.
 * Does nothing when either side is missing.
 */
export function addCookie(
  request: WebRequest | undefined,
  response: WebResponse | undefined,
  name: string,
  value: string | null,
  maxAge: number,
  options: CookieOptions = {},
): void {
  if (request === undefined || response === undefined) {
    return;
  }

  const httpOnly = options.httpOnly ?? false;
  const cookie: Cookie = {
    name,
    value,
    maxAge,
    path: resolveCookiePath(request, options.path),
    secure: request.isSecure(),
    httpOnly,
  };

  if (isNotBlank(options.domain)) {
    cookie.domain = options.domain;
  }

  response.addCookie(cookie);
  logJsonl('DEBUG', 'cookie_added', {
    name: cookie.name,
    value: cookie.value,
    maxAge: cookie.maxAge,
    httpOnly,
    path: cookie.path,
    domain: cookie.domain ?? null,
  });
}

/**
 * Expires a cookie on the client: empty value, `Max-Age=0`, always http-only.
 */
export function failureCookie(
  request: WebRequest | undefined,
  response: WebResponse | undefined,
  name: string,
  options: FailureCookieOptions = {},
): void {
  if (request === undefined || response === undefined) {
    return;
  }

  addCookie(request, response, name, null, 0, { ...options, httpOnly: true });
}

/**
 * Cookies of a `Cookie` request header in header order. Only the first occurrence of a name is kept.
 */
export function parseCookieHeader(header: string | undefined): Cookie[] | undefined {
  if (header === undefined || isBlank(header)) {
    return undefined;
  }

  const cookies: Cookie[] = [];
  for (const [name, value] of Object.entries(parse(header))) {
    if (value === undefined) {
      continue;
    }

    cookies.push({ name, value, secure: false, httpOnly: false });
  }

  return cookies;
}

/**
 * `Set-Cookie` header value for a cookie. A `null` value is written as an empty string.
 */
export function serializeCookie(cookie: Cookie): string {
  return serialize(cookie.name, cookie.value ?? '', {
    maxAge: cookie.maxAge,
    path: cookie.path,
    domain: cookie.domain,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
  });
}
