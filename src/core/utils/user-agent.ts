import { USER_AGENT_HEADER } from '../../common/consts.js';
import { isBlank } from '../../common/strings.js';
import type { BrowserName, UserAgent, WebRequest } from '../../types/web.js';

interface BrowserPattern {
  name: BrowserName;
  pattern: RegExp;
}

// Order matters: Chrome sends `Safari/` and sometimes `Version/` as well, so it must be tried first.
const BROWSER_PATTERNS: readonly BrowserPattern[] = Object.freeze([
  { name: 'MSIE', pattern: /MSIE ([\d.]+)/ },
  { name: 'Firefox', pattern: /Firefox\/(\d.+)/ },
  { name: 'Chrome', pattern: /Chrome\/([\d.]+)/ },
  { name: 'Opera', pattern: /Opera[/\s]([\d.]+)/ },
  { name: 'Safari', pattern: /Version\/([\d.]+)/ },
]);

function parseUserAgent(userAgent: string | undefined): UserAgent | undefined {
  if (userAgent === undefined || isBlank(userAgent)) {
    return undefined;
  }

  for (const { name, pattern } of BROWSER_PATTERNS) {
    const match = pattern.exec(userAgent);
    if (match !== null && match[1] !== undefined) {
      return Object.freeze({ name, version: match[1] });
    }
  }

  return undefined;
}

function isWebRequest(input: string | WebRequest): input is WebRequest {
  return typeof input !== 'string';
}

/**
 * Browser name and version from a `User-Agent` value, or from the header of a request.
 */
export function getUserAgent(userAgent: string | undefined): UserAgent | undefined;
export function getUserAgent(request: WebRequest | undefined): UserAgent | undefined;
export function getUserAgent(input: string | WebRequest | undefined): UserAgent | undefined {
  if (input === undefined) {
    return undefined;
  }

  if (isWebRequest(input)) {
    return parseUserAgent(input.getHeader(USER_AGENT_HEADER));
  }

  return parseUserAgent(input);
}
