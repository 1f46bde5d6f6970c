import { Router, Request, Response, NextFunction } from 'express';
import type { PrintRequest } from '../models/print-job.model';
import type { PrintCoordinator } from '../services/print-coordinator.service';
import { RequestError } from '../utils/errors';
import { toPng } from '../utils/raster';
import { normalizePrintParams, parsePrintBody } from '../validators/print.validator';
import { queryValue, respond } from './http-helpers';

export type PrintService = Pick<PrintCoordinator, 'print' | 'preview'>;

/**
 * Query parameters win; a POST without them falls back to its JSON body.
 */
export function extractPrintRequest(req: Request): PrintRequest {
  const text = queryValue(req, 'text');
  const qr = queryValue(req, 'qr');

  if (text !== undefined || qr !== undefined) {
    return normalizePrintParams({ text, qr });
  }
  if (req.method === 'POST') {
    return parsePrintBody(req.body);
  }
  throw new RequestError(400, 'Missing "text" and/or "qr".');
}

export function createPrintRouter(service: PrintService): Router {
  const router = Router();

  /** GET|POST /print - Print text and/or a QR code */
  const print = async (req: Request, res: Response) => {
    const request = extractPrintRequest(req);
    const outcome = await service.print(request);

    res.setHeader('X-Print-Job', outcome.job.id);
    if (outcome.ok) {
      respond(res, 200, 'OK');
    } else {
      respond(res, 500, 'Print error — check server logs.');
    }
  };

  /** GET|POST /preview - Compose without printing, answer with a PNG */
  const preview = async (req: Request, res: Response) => {
    const request = extractPrintRequest(req);
    const outcome = await service.preview(request);

    res.setHeader('X-Print-Job', outcome.job.id);
    if (outcome.ok) {
      res.status(200).type('image/png').send(toPng(outcome.image));
    } else {
      respond(res, 500, 'Preview error — check server logs.');
    }
  };

  // Express 4 does not forward rejected promises to the error handler
  const wrap = (handler: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response, next: NextFunction) => {
      handler(req, res).catch(next);
    };

  router.get('/print', wrap(print));
  router.post('/print', wrap(print));
  router.get('/preview', wrap(preview));
  router.post('/preview', wrap(preview));

  return router;
}
