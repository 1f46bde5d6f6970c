#!/usr/bin/env node
import http from 'http';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import type { BleCentral } from './models/link.model';
import { DeviceResolver } from './services/device-resolver.service';
import { loadDeviceRegistry } from './services/device-registry.service';
import { CatPrinterEncoder } from './services/encoder.service';
import { systemFontSource } from './services/layout.service';
import { PrintCoordinator } from './services/print-coordinator.service';
import { BleTransport, SerialTransport, type Transport } from './services/transport.service';
import { ConfigError, describeError } from './utils/errors';
import { logger } from './utils/logger';

/** Only the configured link's native bindings are loaded */
async function createLink(config: AppConfig): Promise<{ transport: Transport; central?: BleCentral }> {
  if (config.target.kind === 'serial') {
    const { openSerialLink } = await import('./services/serial-link.service');
    return { transport: new SerialTransport(openSerialLink, config.baudRate) };
  }
  const { NobleCentral } = await import('./services/noble-central.service');
  const central = new NobleCentral(config.bleScanTimeoutMs);
  return { transport: new BleTransport(central), central };
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return 2;
    }
    throw error;
  }

  const registry = loadDeviceRegistry(config.modelsFile);
  const { transport, central } = await createLink(config);

  const coordinator = new PrintCoordinator({
    target: config.target,
    resolver: new DeviceResolver({
      registry,
      central,
      scanTimeoutMs: config.bleScanTimeoutMs,
      strictAddress: config.strictAddress,
    }),
    encoder: new CatPrinterEncoder(),
    transport,
    fontSource: systemFontSource(config.fontPath),
    deadlineMs: config.blePrintTimeoutMs,
  });

  const app = createApp({ service: coordinator, transportKind: config.target.kind, version: config.version });
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => resolve());
  });

  logger.info({ host: config.host, port: config.port, target: config.target }, 'Print server listening');
  logger.info(`GET  http://${config.host}:${config.port}/print?text=...&qr=...`);
  logger.info(`POST http://${config.host}:${config.port}/print  (JSON: {"text": "...", "qr": "..."})`);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) logger.error({ error: describeError(err) }, 'Error while closing server');
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return 0;
}

main()
  .then((code) => {
    if (code !== 0) process.exit(code);
  })
  .catch((error: unknown) => {
    logger.fatal({ error: describeError(error) }, 'Print server failed to start');
    process.exit(1);
  });
