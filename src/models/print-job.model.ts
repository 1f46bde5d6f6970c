import type { PrintErrorCode } from '../utils/errors';

/** Coordinator state machine; one value per job */
export type PrintJobStatus =
  | 'idle'
  | 'resolving'
  | 'composing'
  | 'encoding'
  | 'delivering'
  | 'done'
  | 'failed';

export type PrintJobSource = 'print' | 'preview';

export type StructuredValue = { readonly [key: string]: JsonValue } | readonly JsonValue[];
export type JsonValue = string | number | boolean | null | StructuredValue;

/** Display text is a flat string, or a nested object/array flattened at layout time */
export type TextContent = string | StructuredValue;

/** Normalized request handed to the coordinator; text is never empty after trim */
export interface PrintRequest {
  readonly text: TextContent;
  /** Absent selects text-only layout */
  readonly qr?: string;
}

export interface PrintJob {
  readonly id: string;
  readonly status: PrintJobStatus;
  readonly source: PrintJobSource;
  readonly mode: 'qr' | 'text';
  readonly createdAt: Date;
  readonly completedAt?: Date;
  readonly printer?: string;
  readonly bytes?: number;
  readonly error?: { readonly code: PrintErrorCode; readonly message: string };
}
