import type http from 'node:http';
import { TLSSocket } from 'node:tls';

import { DEFAULT_HOST, HttpCode, LOCATION_HEADER } from '../common/consts.js';
import type { Cookie, WebRequest, WebResponse } from '../types/web.js';
import { parseCookieHeader, serializeCookie } from './utils/cookies.js';
import { getHeaderValue, toHeaderList } from './utils/headers.js';
import { splitRequestTarget } from './utils/request.js';

export interface NodeRequestOptions {
  /**
   * Path prefix the application is mounted under. Defaults to `""`.
   */
  contextPath?: string;
}

export function toWebRequest(req: http.IncomingMessage, options: NodeRequestOptions = {}): WebRequest {
  const contextPath = options.contextPath ?? '';
  const target = splitRequestTarget(req.url);
  const secure = req.socket instanceof TLSSocket && req.socket.encrypted;
  let cookies: Cookie[] | undefined | null = null;

  return {
    getHeader: (name) => getHeaderValue(req.headers, name),
    getCookies() {
      if (cookies === null) {
        cookies = parseCookieHeader(getHeaderValue(req.headers, 'Cookie'));
      }
      return cookies;
    },
    getRemoteAddr: () => req.socket.remoteAddress ?? '',
    getContextPath: () => contextPath,
    isSecure: () => secure,
    getRequestUrl() {
      const host = getHeaderValue(req.headers, 'Host') ?? DEFAULT_HOST;
      return `${secure ? 'https' : 'http'}://${host}${target.path}`;
    },
    getQueryString: () => target.queryString,
  };
}

export function toWebResponse(res: http.ServerResponse): WebResponse {
  return {
    addCookie(cookie) {
      const setCookie = toHeaderList(res.getHeader('Set-Cookie'));
      setCookie.push(serializeCookie(cookie));
      res.setHeader('Set-Cookie', setCookie);
    },
    setStatus(code) {
      res.statusCode = code;
    },
    setHeader(name, value) {
      res.setHeader(name, value);
    },
    sendRedirect(url) {
      res.writeHead(HttpCode.Found, { [LOCATION_HEADER]: url });
      res.end();
    },
  };
}
