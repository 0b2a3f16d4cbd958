export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 3000;
export const DEFAULT_COOKIE_PATH = '/';

export const USER_AGENT_HEADER = 'User-Agent';
export const LOCATION_HEADER = 'Location';

/**
 * Headers that proxies and load balancers use to carry the client's address, in lookup order.
 */
export const CLIENT_IP_HEADERS: readonly string[] = Object.freeze([
  'X-Forwarded-For',
  'Proxy-Client-IP',
  'WL-Proxy-Client-IP',
  'HTTP_X_FORWARDED_FOR',
  'HTTP_X_FORWARDED',
  'HTTP_X_CLUSTER_CLIENT_IP',
  'HTTP_CLIENT_IP',
  'HTTP_FORWARDED_FOR',
  'HTTP_FORWARDED',
  'HTTP_VIA',
  'REMOTE_ADDR',
]);

export const enum HttpCode {
  Ok = 200,
  NoContent = 204,
  MovedPermanently = 301,
  Found = 302,
  BadRequest = 400,
  NotFound = 404,
  InternalServerError = 500,
}
