/**
 * Error taxonomy for print jobs.
 *
 * Every failure a job can hit maps onto one of these classes. The coordinator
 * catches them at its boundary and turns them into a PrintOutcome; nothing
 * below the HTTP layer retries.
 */

export type PrintErrorCode =
  | 'RENDER_ERROR'
  | 'DEVICE_NOT_FOUND'
  | 'UNKNOWN_MODEL'
  | 'MODEL_REQUIRED'
  | 'TRANSPORT_ERROR'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export class PrintError extends Error {
  readonly code: PrintErrorCode;

  constructor(code: PrintErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrintError';
    this.code = code;
  }
}

/** Font could not be loaded or the QR payload could not be encoded */
export class RenderError extends PrintError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RENDER_ERROR', message, options);
    this.name = 'RenderError';
  }
}

export class DeviceNotFoundError extends PrintError {
  constructor(message: string) {
    super('DEVICE_NOT_FOUND', message);
    this.name = 'DeviceNotFoundError';
  }
}

export class UnknownModelError extends PrintError {
  constructor(message: string) {
    super('UNKNOWN_MODEL', message);
    this.name = 'UnknownModelError';
  }
}

/** Serial links have no discovery, so the model must be given explicitly */
export class ModelRequiredError extends PrintError {
  constructor(message = 'A printer model is required for serial transport (--model / PRINTER_MODEL)') {
    super('MODEL_REQUIRED', message);
    this.name = 'ModelRequiredError';
  }
}

/** Link-level I/O fault while connecting to or writing to the printer */
export class TransportError extends PrintError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends PrintError {
  constructor(timeoutMs: number) {
    super('TIMEOUT', `Print job abandoned after ${timeoutMs} ms`);
    this.name = 'TimeoutError';
  }
}

/** Invalid startup configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Rejected HTTP input; carries the status code to answer with */
export class RequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'RequestError';
    this.status = status;
  }
}

/** Wrap anything thrown by a collaborator into a PrintError */
export function toPrintError(error: unknown): PrintError {
  if (error instanceof PrintError) return error;
  const msg = error instanceof Error ? error.message : String(error);
  return new PrintError('INTERNAL_ERROR', msg, { cause: error });
}

/** Render an error and its cause chain as one line for logs */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  while (current !== undefined && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }
  return parts.join(' <- ');
}
