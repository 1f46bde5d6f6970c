import path from 'path';
import { describe, it, expect } from 'vitest';
import { createDeviceRegistry, loadDeviceRegistry, normalizeWidth } from './device-registry.service';

const MODELS_FILE = path.join(__dirname, '..', '..', 'data', 'printer-models.json');

describe('device registry', () => {
  const registry = loadDeviceRegistry(MODELS_FILE);

  it('looks models up case-insensitively', () => {
    expect(registry.lookup('gb01')).toEqual({
      model: 'GB01',
      widthDots: 384,
      imageMtuBytes: 20,
      writeIntervalMs: 4,
    });
    expect(registry.lookup(' M04S ')?.widthDots).toBe(1232);
  });

  it('leaves transport constants unset where the model has none', () => {
    const x6 = registry.lookup('X6');
    expect(x6?.imageMtuBytes).toBeUndefined();
    expect(x6?.writeIntervalMs).toBeUndefined();
  });

  it('returns undefined for unknown models', () => {
    expect(registry.lookup('ZZ99')).toBeUndefined();
  });

  it('infers the model from the longest matching name prefix', () => {
    expect(registry.inferModel('X6h-1A2B')).toBe('X6h');
    expect(registry.inferModel('X6-1A2B')).toBe('X6');
    expect(registry.inferModel('timini-77')).toBe('X6');
    expect(registry.inferModel('M02 Pro')).toBe('M02 Pro');
    expect(registry.inferModel('P1_0042')).toBe('P1');
  });

  it('cannot infer from unknown or empty names', () => {
    expect(registry.inferModel('Headphones')).toBeUndefined();
    expect(registry.inferModel('   ')).toBeUndefined();
  });

  it('accepts an in-memory model list', () => {
    const custom = createDeviceRegistry([{ name: 'Lab', namePrefixes: ['LAB'], widthDots: 200 }]);
    expect(custom.inferModel('lab-1')).toBe('Lab');
    expect(custom.lookup('LAB')?.widthDots).toBe(200);
  });
});

describe('normalizeWidth', () => {
  it('rounds down to whole bytes', () => {
    expect(normalizeWidth(384)).toBe(384);
    expect(normalizeWidth(390)).toBe(384);
  });

  it('keeps at least one byte', () => {
    expect(normalizeWidth(4)).toBe(8);
  });
});
