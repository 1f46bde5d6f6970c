import express from 'express';
import cors from 'cors';
import type { TransportKind } from './models/device-profile.model';
import { createJobRouter } from './routes/job.routes';
import { accessLog, errorHandler, MAX_BODY_BYTES, respond, USAGE } from './routes/http-helpers';
import { createPrintRouter, type PrintService } from './routes/print.routes';

export interface AppDeps {
  readonly service: PrintService;
  readonly transportKind: TransportKind;
  readonly version: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.set('query parser', 'simple');

  // Middleware
  app.use(accessLog);
  app.use(cors());
  // Any POST body is read as JSON, whatever its content type
  app.use(express.json({ limit: MAX_BODY_BYTES, strict: false, type: () => true }));

  // Routes
  app.use(createPrintRouter(deps.service));
  app.use('/api/jobs', createJobRouter());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      success: true,
      service: 'label-print-server',
      version: deps.version,
      transport: deps.transportKind,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use((_req, res) => {
    respond(res, 404, `Not found.\n\n${USAGE}`);
  });

  app.use(errorHandler);

  return app;
}
