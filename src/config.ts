import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import type { TargetSpec } from './models/device-profile.model';
import { ConfigError } from './utils/errors';

dotenv.config();

// In dev: project root. In dist: also project root (dist/..).
const baseDir = path.join(__dirname, '..');

function readVersion(): string {
  const pkgPath = path.join(baseDir, 'package.json');
  if (!fs.existsSync(pkgPath)) return '0.0.0';

  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const rawConfigSchema = z.object({
  bluetooth: optionalString,
  serial: optionalString,
  model: optionalString,
  host: z.string().min(1).default('0.0.0.0'),
  port: positiveInt(8080),
  baudRate: positiveInt(115200),
  fontPath: optionalString,
  bleScanTimeoutMs: positiveInt(5000),
  blePrintTimeoutMs: positiveInt(60_000),
  strictAddress: booleanFlag,
  logLevel: z.string().default('info'),
});

export interface AppConfig {
  readonly host: string;
  readonly port: number;
  readonly logLevel: string;
  readonly target: TargetSpec;
  readonly baudRate: number;
  readonly fontPath?: string;
  readonly bleScanTimeoutMs: number;
  readonly blePrintTimeoutMs: number;
  /** Fail when a configured BLE address is not seen during the scan */
  readonly strictAddress: boolean;
  readonly modelsFile: string;
  readonly version: string;
}

/**
 * Build the process configuration. CLI flags win over environment variables,
 * which win over defaults.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  let flags: { bluetooth?: string; serial?: string; model?: string; port?: string; host?: string };
  try {
    flags = parseArgs({
      args: [...argv],
      options: {
        bluetooth: { type: 'string' },
        serial: { type: 'string' },
        model: { type: 'string' },
        port: { type: 'string' },
        host: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const parsed = rawConfigSchema.safeParse({
    bluetooth: flags.bluetooth ?? env.PRINTER_BLUETOOTH,
    serial: flags.serial ?? env.PRINTER_SERIAL,
    model: flags.model ?? env.PRINTER_MODEL,
    host: flags.host ?? env.PRINT_HOST,
    port: flags.port ?? env.PRINT_PORT,
    baudRate: env.PRINTER_BAUD_RATE,
    fontPath: env.FONT_PATH,
    bleScanTimeoutMs: env.BLE_SCAN_TIMEOUT_MS,
    blePrintTimeoutMs: env.BLE_PRINT_TIMEOUT_MS,
    strictAddress: env.PRINTER_STRICT_ADDRESS?.toLowerCase(),
    logLevel: env.LOG_LEVEL,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`);
  }

  const raw = parsed.data;
  if (raw.bluetooth && raw.serial) {
    throw new ConfigError('Specify either --bluetooth / PRINTER_BLUETOOTH or --serial / PRINTER_SERIAL, not both.');
  }

  let target: TargetSpec;
  if (raw.serial) {
    target = { kind: 'serial', addressOrPath: raw.serial, modelOverride: raw.model };
  } else if (raw.bluetooth) {
    target = { kind: 'ble', addressOrPath: raw.bluetooth, modelOverride: raw.model };
  } else {
    throw new ConfigError('Specify --bluetooth / PRINTER_BLUETOOTH or --serial / PRINTER_SERIAL.');
  }

  return {
    host: raw.host,
    port: raw.port,
    logLevel: raw.logLevel,
    target,
    baudRate: raw.baudRate,
    fontPath: raw.fontPath,
    bleScanTimeoutMs: raw.bleScanTimeoutMs,
    blePrintTimeoutMs: raw.blePrintTimeoutMs,
    strictAddress: raw.strictAddress,
    modelsFile: path.join(baseDir, 'data', 'printer-models.json'),
    version: readVersion(),
  };
}
