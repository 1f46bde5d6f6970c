import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { RequestError } from '../utils/errors';
import { logger } from '../utils/logger';

export const MAX_BODY_BYTES = 10_240;

export const USAGE = 'Usage: GET /print?text=...&qr=... or POST /print with JSON body.';

/** Plain-text response; the body always ends in a newline */
export function respond(res: Response, status: number, body: string): void {
  res
    .status(status)
    .type('text/plain; charset=utf-8')
    .send(body.endsWith('\n') ? body : `${body}\n`);
}

/** First value of a query parameter, or undefined when the key is absent */
export function queryValue(req: Request, key: string): string | undefined {
  const value = req.query[key];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/** One access line per request */
export const accessLog: RequestHandler = (req, res, next) => {
  const started = Date.now();
  res.on('finish', () => {
    logger.info(
      { method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - started, remote: req.ip },
      'HTTP request'
    );
  });
  next();
};

function errorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

/** Map body-parser and request errors to plain-text answers */
export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof RequestError) {
    respond(res, err.status, err.message);
    return;
  }

  switch (errorType(err)) {
    case 'entity.too.large':
      respond(res, 413, `Request body too large (max ${MAX_BODY_BYTES} bytes).`);
      return;
    case 'entity.parse.failed':
      respond(res, 400, 'Invalid JSON body.');
      return;
    case 'encoding.unsupported':
    case 'charset.unsupported':
      respond(res, 415, 'Unsupported body encoding.');
      return;
  }

  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled request error');
  respond(res, 500, 'Internal error.');
};
