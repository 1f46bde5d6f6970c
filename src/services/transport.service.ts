/**
 * Transports deliver one encoded job to the printer link.
 *
 * The stream is cut into MTU-sized positional slices; each slice is written
 * and followed by the profile's write interval before the next one, because
 * the printer buffer cannot absorb an unthrottled burst. The link is always
 * closed before deliver() settles, including when the job is aborted.
 */

import { setTimeout as delay } from 'timers/promises';
import type { ResolvedDevice, TransportKind } from '../models/device-profile.model';
import type { BleCentral, SerialLinkFactory } from '../models/link.model';
import { PrintError, TransportError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/** GATT characteristic every print write goes to */
export const BLE_WRITE_UUID = '0000ae01-0000-1000-8000-00805f9b34fb';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface Transport {
  readonly kind: TransportKind;
  deliver(bytes: Uint8Array, device: ResolvedDevice, signal?: AbortSignal): Promise<void>;
}

/** Split into consecutive slices of `mtu` bytes; the last one may be shorter */
export function chunkStream(bytes: Uint8Array, mtu: number): Buffer[] {
  if (!Number.isInteger(mtu) || mtu < 1) {
    throw new TransportError(`Invalid MTU: ${mtu}`);
  }
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < buf.length; offset += mtu) {
    chunks.push(buf.subarray(offset, offset + mtu));
  }
  return chunks;
}

interface PacedLink {
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
}

/** Settle with `work`, or reject with the abort reason as soon as `signal` fires */
function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

async function writePaced(
  link: PacedLink,
  chunks: readonly Buffer[],
  intervalMs: number,
  sleep: Sleep,
  signal?: AbortSignal,
): Promise<void> {
  for (let i = 0; i < chunks.length; i++) {
    signal?.throwIfAborted();
    await abortable(link.write(chunks[i]), signal);
    if (i < chunks.length - 1 && intervalMs > 0) {
      await abortable(sleep(intervalMs), signal);
    }
  }
}

function asTransportError(error: unknown, action: string): PrintError {
  if (error instanceof PrintError) return error;
  return new TransportError(`${action}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
}

async function closeQuietly(close: () => Promise<void>, meta: Record<string, unknown>): Promise<void> {
  try {
    await close();
  } catch (err) {
    logger.warn({ ...meta, error: describeError(err) }, 'Failed to close printer link');
  }
}

interface DeliveryPlan {
  readonly open: () => Promise<PacedLink>;
  readonly chunks: readonly Buffer[];
  readonly intervalMs: number;
  readonly sleep: Sleep;
  readonly signal?: AbortSignal;
  readonly openFailure: string;
  readonly writeFailure: string;
  readonly meta: Record<string, unknown>;
}

/**
 * Open the link, write every chunk and close it. An abort closes the link
 * immediately, so a write stalled in the driver cannot keep it open; the
 * returned promise settles only after the close.
 */
async function deliverPaced(plan: DeliveryPlan): Promise<void> {
  const { chunks, intervalMs, sleep, signal, meta } = plan;
  signal?.throwIfAborted();

  const opening = plan.open();
  let link: PacedLink;
  try {
    link = await abortable(opening, signal);
  } catch (err) {
    if (signal?.aborted) {
      // The link may still come up after the job was abandoned
      void opening.then(
        (late) => closeQuietly(() => late.close(), meta),
        (lateErr: unknown) => logger.debug({ ...meta, error: describeError(lateErr) }, 'Abandoned link failed to open'),
      );
    }
    throw asTransportError(err, plan.openFailure);
  }

  const opened = link;
  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    if (!closing) closing = closeQuietly(() => opened.close(), meta);
    return closing;
  };
  const onAbort = () => {
    logger.debug(meta, 'Job aborted; closing printer link');
    void close();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    logger.debug({ ...meta, chunks: chunks.length }, 'Writing print job');
    await writePaced(opened, chunks, intervalMs, sleep, signal);
  } catch (err) {
    throw asTransportError(err, plan.writeFailure);
  } finally {
    signal?.removeEventListener('abort', onAbort);
    await close();
  }
}

/** Chunked, paced writes to the printer's GATT characteristic */
export class BleTransport implements Transport {
  readonly kind = 'ble' as const;

  constructor(
    private readonly central: BleCentral,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async deliver(bytes: Uint8Array, device: ResolvedDevice, signal?: AbortSignal): Promise<void> {
    const { imageMtuBytes, writeIntervalMs } = device.profile;
    await deliverPaced({
      open: () => this.central.connect(device.address, BLE_WRITE_UUID, signal),
      chunks: chunkStream(bytes, imageMtuBytes),
      intervalMs: writeIntervalMs,
      sleep: this.sleep,
      signal,
      openFailure: `BLE connect to ${device.address} failed`,
      writeFailure: `BLE write to ${device.address} failed`,
      meta: { address: device.address, bytes: bytes.length },
    });
  }
}

/** Same pacing over a serial (RFCOMM or USB-serial) port */
export class SerialTransport implements Transport {
  readonly kind = 'serial' as const;

  constructor(
    private readonly openLink: SerialLinkFactory,
    private readonly baudRate: number,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async deliver(bytes: Uint8Array, device: ResolvedDevice, signal?: AbortSignal): Promise<void> {
    const { imageMtuBytes, writeIntervalMs } = device.profile;
    await deliverPaced({
      open: () => this.openLink(device.address, this.baudRate),
      chunks: chunkStream(bytes, imageMtuBytes),
      intervalMs: writeIntervalMs,
      sleep: this.sleep,
      signal,
      openFailure: `Cannot open serial port ${device.address}`,
      writeFailure: `Serial write to ${device.address} failed`,
      meta: { path: device.address, bytes: bytes.length },
    });
  }
}
