import http from 'node:http';

import createRouter from 'find-my-way';

import { HttpCode } from '../common/consts.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import { isBlank } from '../common/strings.js';
import type { WebRequest, WebResponse } from '../types/web.js';

import { toWebRequest, toWebResponse } from './node-adapter.js';
import { addCookie, failureCookie, findCookieValue } from './utils/cookies.js';
import { getClientIpAddr } from './utils/real-ip.js';
import { redirect } from './utils/redirect.js';
import { getFullRequestUrl } from './utils/request.js';
import { safeSendJson, sendEmpty, sendJson } from './utils/send-json.js';
import { getUserAgent } from './utils/user-agent.js';

export interface ServerOptions {
  host: string;

  port: number;

  /**
   * Path prefix the application is mounted under, used as the default cookie path.
   */
  contextPath?: string;
}

interface RouteContext {
  res: http.ServerResponse;
  request: WebRequest;
  response: WebResponse;
  params: Record<string, string | undefined>;
  query: URLSearchParams;
}

type RouteHandler = (context: RouteContext) => void;

type NodeRouteHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  params: Record<string, string | undefined>,
) => void;

function parseBooleanParam(value: string | null): boolean {
  return value !== null && value.trim().toLowerCase() === 'true';
}

function parseMaxAge(value: string | null): number | undefined {
  if (value === null || isBlank(value)) {
    return undefined;
  }

  const maxAge = Number(value);
  return Number.isInteger(maxAge) ? maxAge : undefined;
}

const handleIp: RouteHandler = ({ res, request }) => {
  sendJson(res, { ip: getClientIpAddr(request) ?? null });
};

const handleAgent: RouteHandler = ({ res, request }) => {
  sendJson(res, { agent: getUserAgent(request) ?? null });
};

const handleUrl: RouteHandler = ({ res, request }) => {
  sendJson(res, { url: getFullRequestUrl(request) });
};

const handleGetCookie: RouteHandler = ({ res, request, params }) => {
  const name = params.name ?? '';
  const value = findCookieValue(request, name);

  if (value === undefined) {
    sendJson(res, { message: 'Cookie not found', name }, HttpCode.NotFound);
    return;
  }

  sendJson(res, { name, value });
};

const handlePutCookie: RouteHandler = ({ res, request, response, params, query }) => {
  const maxAge = parseMaxAge(query.get('maxAge'));

  if (maxAge === undefined) {
    sendJson(res, { message: 'maxAge must be an integer' }, HttpCode.BadRequest);
    return;
  }

  addCookie(request, response, params.name ?? '', query.get('value') ?? '', maxAge, {
    domain: query.get('domain') ?? undefined,
    path: query.get('path') ?? undefined,
    httpOnly: parseBooleanParam(query.get('httpOnly')),
  });
  sendEmpty(res);
};

const handleDeleteCookie: RouteHandler = ({ res, request, response, params, query }) => {
  failureCookie(request, response, params.name ?? '', {
    domain: query.get('domain') ?? undefined,
    path: query.get('path') ?? undefined,
  });
  sendEmpty(res);
};

const handleRedirect: RouteHandler = ({ res, response, query }) => {
  const to = query.get('to');

  if (to === null || isBlank(to)) {
    sendJson(res, { message: 'Missing redirect target' }, HttpCode.BadRequest);
    return;
  }

  const permanent = parseBooleanParam(query.get('permanent'));
  redirect(response, to, permanent);

  if (permanent) {
    res.end();
  }
};

/**
 * Creates the inspection server that exposes every helper over HTTP. Call `listen` on the result.
 */
export function createServer(options: Pick<ServerOptions, 'contextPath'> = {}): http.Server {
  const router = createRouter({
    defaultRoute(req, res) {
      safeSendJson(
        res,
        {
          message: 'Route not found',
          method: req.method,
          url: req.url ?? null,
        },
        HttpCode.NotFound,
      );
    },
  });

  const route = (handler: RouteHandler): NodeRouteHandler => {
    return (req, res, params) => {
      const request = toWebRequest(req, { contextPath: options.contextPath });
      const query = new URLSearchParams(request.getQueryString() ?? '');

      try {
        handler({ res, request, response: toWebResponse(res), params, query });
      } catch (error) {
        logJsonl('ERROR', 'request_failed', {
          method: req.method ?? 'GET',
          url: req.url ?? null,
          error: getErrorMessage(error),
        });

        safeSendJson(res, { message: 'Internal Server Error' }, HttpCode.InternalServerError);
      }
    };
  };

  router.on('GET', '/ip', route(handleIp));
  router.on('GET', '/agent', route(handleAgent));
  router.on('GET', '/url', route(handleUrl));
  router.on('GET', '/cookies/:name', route(handleGetCookie));
  router.on('PUT', '/cookies/:name', route(handlePutCookie));
  router.on('DELETE', '/cookies/:name', route(handleDeleteCookie));
  router.on('GET', '/redirect', route(handleRedirect));

  return http.createServer((req, res) => {
    const method = req.method ?? 'GET';
    const requestUrl = req.url ?? null;
    const ip = getClientIpAddr(toWebRequest(req)) ?? null;

    logJsonl('INFO', 'request_received', { method, ip, url: requestUrl });

    res.once('finish', () => {
      logJsonl('INFO', 'request_completed', {
        method,
        ip,
        url: requestUrl,
        statusCode: res.statusCode,
      });
    });

    router.lookup(req, res);
  });
}

export function startServer(options: ServerOptions): http.Server {
  const server = createServer(options);

  server.on('close', () => {
    log('INFO', `Server closed at http://${options.host}:${options.port}`);
  });

  server.listen(options.port, options.host, () => {
    log('INFO', `Server started at http://${options.host}:${options.port}`);
  });

  return server;
}
