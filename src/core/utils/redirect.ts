import { HttpCode, LOCATION_HEADER } from '../../common/consts.js';
import type { WebResponse } from '../../types/web.js';

/**
 * Redirects to `url`. A permanent redirect only sets the status and `Location`, leaving the body and
 * the end of the response to the caller; a temporary one goes through the transport's own redirect.
 *
 * Errors from the transport, such as headers that were already sent, are rethrown as is.
 */
export function redirect(response: WebResponse, url: string, permanent: boolean): void {
  if (!permanent) {
    response.sendRedirect(url);
    return;
  }

  response.setStatus(HttpCode.MovedPermanently);
  response.setHeader(LOCATION_HEADER, url);
}
