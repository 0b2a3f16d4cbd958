/**
 * A cookie as sent by the client or about to be written to the response.
 */
export interface Cookie {
  name: string;
  /**
   * `null` clears the cookie's value.
   */
  value: string | null;
  /**
   * Lifetime in seconds. Zero or negative expires the cookie immediately, `undefined` makes it a session cookie.
   */
  maxAge?: number;
  path?: string;
  domain?: string;
  secure: boolean;
  httpOnly: boolean;
}

/**
 * Request side of the hosting framework, as far as these helpers need it.
 */
export interface WebRequest {
  getHeader(name: string): string | undefined;
  getCookies(): readonly Cookie[] | undefined;
  getRemoteAddr(): string;
  /**
   * Path prefix the application is mounted under, `""` for the root.
   */
  getContextPath(): string;
  isSecure(): boolean;
  /**
   * Scheme, host and path of the request, without the query string.
   */
  getRequestUrl(): string;
  /**
   * Raw text after the first `?`, or `undefined` when the target has none.
   */
  getQueryString(): string | undefined;
}

/**
 * Response side of the hosting framework.
 */
export interface WebResponse {
  addCookie(cookie: Cookie): void;
  setStatus(code: number): void;
  setHeader(name: string, value: string): void;
  /**
   * Temporary (302) redirect written by the transport itself.
   */
  sendRedirect(url: string): void;
}

export type BrowserName = 'MSIE' | 'Firefox' | 'Chrome' | 'Opera' | 'Safari';

export interface UserAgent {
  readonly name: BrowserName;
  readonly version: string;
}

export interface CookieOptions {
  domain?: string;
  /**
   * Defaults to the request's context path, or `/` when that is blank.
   */
  path?: string;
  httpOnly?: boolean;
}

export type FailureCookieOptions = Omit<CookieOptions, 'httpOnly'>;
