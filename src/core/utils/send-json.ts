import type { ServerResponse } from 'node:http';
import { HttpCode } from '../../common/consts.js';

export function sendJson(res: ServerResponse, payload: unknown, statusCode: HttpCode = HttpCode.Ok): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(payload));
}

/**
 * Like `sendJson`, but tolerates a response that has already been (partly) written.
 */
export function safeSendJson(res: ServerResponse, payload: unknown, statusCode: HttpCode = HttpCode.Ok): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  sendJson(res, payload, statusCode);
}

export function sendEmpty(res: ServerResponse, statusCode: HttpCode = HttpCode.NoContent): void {
  res.statusCode = statusCode;
  res.end();
}
