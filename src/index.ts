export type {
  BrowserName,
  Cookie,
  CookieOptions,
  FailureCookieOptions,
  UserAgent,
  WebRequest,
  WebResponse,
} from './types/web.js';

export { getClientIpAddr } from './core/utils/real-ip.js';
export {
  addCookie,
  failureCookie,
  findCookie,
  findCookieValue,
  parseCookieHeader,
  serializeCookie,
} from './core/utils/cookies.js';
export { getFullRequestUrl, splitRequestTarget } from './core/utils/request.js';
export { redirect } from './core/utils/redirect.js';
export { getUserAgent } from './core/utils/user-agent.js';
export { toWebRequest, toWebResponse, type NodeRequestOptions } from './core/node-adapter.js';
export { createServer, startServer, type ServerOptions } from './core/server.js';

export { ConfigError, loadConfig, type WebUtilsConfig } from './common/config.js';
export { getLogLevel, setLogLevel, type LogLevel } from './common/logger.js';
