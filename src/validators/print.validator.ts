import { z } from 'zod';
import type { JsonValue, PrintRequest, TextContent } from '../models/print-job.model';
import { toDisplayText } from '../services/text-format.service';
import { RequestError } from '../utils/errors';

/** Deepest object/array nesting accepted in a request body */
export const MAX_NESTING_DEPTH = 32;

/** Object/array nesting depth of a parsed JSON value, walked without recursion */
export function nestingDepth(value: unknown, stopAfter = Infinity): number {
  let deepest = 0;
  const stack: Array<{ readonly value: unknown; readonly depth: number }> = [{ value, depth: 0 }];

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item || typeof item.value !== 'object' || item.value === null) continue;

    const depth = item.depth + 1;
    deepest = Math.max(deepest, depth);
    if (deepest > stopAfter) break;

    const children: unknown[] = Array.isArray(item.value) ? item.value : Object.values(item.value);
    for (const child of children) {
      stack.push({ value: child, depth });
    }
  }
  return deepest;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/** POST /print body; null counts as an absent key */
export const printBodySchema = z.object({
  text: jsonValueSchema.optional(),
  qr: jsonValueSchema.optional(),
});

export type PrintBody = z.infer<typeof printBodySchema>;

/** Raw text/qr values as they arrive from the query string or JSON body */
export interface RawPrintParams {
  readonly text?: JsonValue;
  readonly qr?: JsonValue;
}

function toTextContent(value: JsonValue): TextContent {
  if (value === null) return 'null';
  return typeof value === 'object' ? value : String(value);
}

function toQrData(value: JsonValue): string {
  if (value === null) return 'null';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Normalize raw parameters into a PrintRequest.
 *
 * qr present          -> QR layout; text defaults to the qr value
 * qr absent, text set -> text-only layout over the full width
 */
export function normalizePrintParams(params: RawPrintParams): PrintRequest {
  const text = params.text ?? undefined;
  const qr = params.qr ?? undefined;

  if (text === undefined && qr === undefined) {
    throw new RequestError(400, 'Missing "text" and/or "qr".');
  }

  const qrData = qr === undefined ? undefined : toQrData(qr);
  const content: TextContent = text === undefined ? (qrData ?? '') : toTextContent(text);

  if (toDisplayText(content).trim() === '' || (qrData !== undefined && qrData.trim() === '')) {
    throw new RequestError(400, 'Empty text.');
  }

  return qrData === undefined ? { text: content } : { text: content, qr: qrData };
}

/** Parse and normalize a JSON request body */
export function parsePrintBody(body: unknown): PrintRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestError(400, 'JSON body must be an object.');
  }
  if (nestingDepth(body, MAX_NESTING_DEPTH) > MAX_NESTING_DEPTH) {
    throw new RequestError(400, 'Invalid JSON body.');
  }

  const parsed = printBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new RequestError(400, 'Invalid JSON body.');
  }

  const { text, qr } = parsed.data;
  if ((text ?? null) === null && (qr ?? null) === null) {
    throw new RequestError(400, 'JSON body must contain "text" and/or "qr".');
  }
  return normalizePrintParams({ text, qr });
}
