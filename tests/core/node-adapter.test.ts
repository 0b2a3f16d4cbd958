import http from 'node:http';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { toWebRequest, toWebResponse } from '@/core/node-adapter.js';
import { addCookie, failureCookie, findCookieValue } from '@/core/utils/cookies.js';
import { getClientIpAddr } from '@/core/utils/real-ip.js';
import { redirect } from '@/core/utils/redirect.js';
import { getFullRequestUrl } from '@/core/utils/request.js';
import type { WebRequest, WebResponse } from '@/types/web.js';

import { closeServer, createClient, listenEphemeral } from '../helpers/test-utils.js';

type Probe = (request: WebRequest, response: WebResponse, res: http.ServerResponse) => void;

async function startProbe(probe: Probe, contextPath?: string): Promise<{ server: http.Server; baseUrl: string }> {
  const server = http.createServer((req, res) => {
    try {
      probe(toWebRequest(req, { contextPath }), toWebResponse(res), res);
    } catch (error) {
      res.end(error instanceof Error && 'code' in error ? String(error.code) : 'error');
    }
  });

  const { baseUrl } = await listenEphemeral(server);
  return { server, baseUrl };
}

describe('node-adapter', () => {
  const servers: http.Server[] = [];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const server of servers.splice(0)) {
      await closeServer(server);
    }

    vi.restoreAllMocks();
  });

  it('exposes headers, cookies, the remote address and the request url', async () => {
    const { server, baseUrl } = await startProbe((request, _response, res) => {
      res.setHeader('Content-Type', 'application/json');
      res.end(
        JSON.stringify({
          ip: getClientIpAddr(request),
          forwarded: request.getHeader('x-forwarded-for') ?? null,
          sid: findCookieValue(request, 'sid') ?? null,
          url: getFullRequestUrl(request),
          query: request.getQueryString() ?? null,
          secure: request.isSecure(),
        }),
      );
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/orders?a=1&b=2', {
      headers: {
        'X-Forwarded-For': '203.0.113.7',
        Cookie: 'theme=dark; sid=abc',
      },
    });

    expect(response.data).toEqual({
      ip: '127.0.0.1',
      forwarded: '203.0.113.7',
      sid: 'abc',
      url: `${baseUrl}/orders?a=1&b=2`,
      query: 'a=1&b=2',
      secure: false,
    });
  });

  it('returns a proxy header that literally reads unknown', async () => {
    const { server, baseUrl } = await startProbe((request, _response, res) => {
      res.end(getClientIpAddr(request));
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/', { headers: { 'Proxy-Client-IP': 'Unknown' } });

    expect(response.data).toBe('Unknown');
  });

  it('reports no cookies when the header is absent', async () => {
    const { server, baseUrl } = await startProbe((request, _response, res) => {
      res.end(String(request.getCookies()));
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/');

    expect(response.data).toBe('undefined');
  });

  it('appends one Set-Cookie header per cookie', async () => {
    const { server, baseUrl } = await startProbe((request, response, res) => {
      addCookie(request, response, 'sid', 'abc', 3600, { httpOnly: true });
      failureCookie(request, response, 'legacy');
      res.end();
    }, '/shop');
    servers.push(server);

    const response = await createClient(baseUrl).get('/');

    const setCookie = response.headers['set-cookie'] ?? [];

    expect(setCookie.map((header) => header.split('; ').sort())).toEqual([
      ['HttpOnly', 'Max-Age=3600', 'Path=/shop', 'sid=abc'],
      ['HttpOnly', 'Max-Age=0', 'Path=/shop', 'legacy='],
    ]);
  });

  it('sends a temporary redirect through the transport', async () => {
    const { server, baseUrl } = await startProbe((_request, response) => {
      redirect(response, '/next', false);
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/');

    expect(response.status).toBe(302);
    expect(response.headers.location).toBe('/next');
  });

  it('leaves the body of a permanent redirect to the caller', async () => {
    const { server, baseUrl } = await startProbe((_request, response, res) => {
      redirect(response, '/moved', true);
      res.end('moved');
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/moved');
    expect(response.data).toBe('moved');
  });

  it('throws when redirecting after the headers went out', async () => {
    const { server, baseUrl } = await startProbe((_request, response, res) => {
      res.writeHead(200);
      redirect(response, '/late', true);
    });
    servers.push(server);

    const response = await createClient(baseUrl).get('/');

    expect(response.status).toBe(200);
    expect(response.data).toBe('ERR_HTTP_HEADERS_SENT');
  });
});
