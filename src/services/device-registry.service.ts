import fs from 'fs';
import { z } from 'zod';
import type { DeviceProfile, PrinterModelEntry } from '../models/device-profile.model';
import { logger } from '../utils/logger';

const modelEntrySchema = z.object({
  name: z.string().min(1),
  namePrefixes: z.array(z.string().min(1)).default([]),
  widthDots: z.number().int().positive(),
  imageMtuBytes: z.number().int().positive().optional(),
  writeIntervalMs: z.number().int().nonnegative().optional(),
});

const modelFileSchema = z.array(modelEntrySchema);

/** Read-only lookup of per-model printer constants */
export interface DeviceRegistry {
  lookup(modelName: string): DeviceProfile | undefined;
  inferModel(advertisedName: string): string | undefined;
}

function toProfile(entry: PrinterModelEntry): DeviceProfile {
  return {
    model: entry.name,
    widthDots: entry.widthDots,
    imageMtuBytes: entry.imageMtuBytes,
    writeIntervalMs: entry.writeIntervalMs,
  };
}

/** Registry over an in-memory model list */
export function createDeviceRegistry(entries: readonly PrinterModelEntry[]): DeviceRegistry {
  const byName = new Map<string, DeviceProfile>();
  for (const entry of entries) {
    byName.set(entry.name.toLowerCase(), Object.freeze(toProfile(entry)));
  }

  const prefixes = entries
    .flatMap((entry) => entry.namePrefixes.map((prefix) => ({ prefix: prefix.toLowerCase(), model: entry.name })))
    .sort((a, b) => b.prefix.length - a.prefix.length);

  return {
    lookup(modelName) {
      return byName.get(modelName.trim().toLowerCase());
    },
    inferModel(advertisedName) {
      const name = advertisedName.trim().toLowerCase();
      if (!name) return undefined;
      return prefixes.find((p) => name.startsWith(p.prefix))?.model;
    },
  };
}

/** Load the registry from a JSON model file */
export function loadDeviceRegistry(filePath: string): DeviceRegistry {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const entries = modelFileSchema.parse(raw);
  logger.info({ filePath, models: entries.length }, 'Printer models loaded');
  return createDeviceRegistry(entries);
}

/** Round a paper width down to whole bytes of dots */
export function normalizeWidth(widthDots: number): number {
  return Math.max(8, widthDots - (widthDots % 8));
}
