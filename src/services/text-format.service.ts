/**
 * Text Format Service: turns request text into the lines the layout engine draws.
 *
 * Flat strings are split on newlines, tab-expanded to 4-column stops and
 * greedily word-wrapped to the column count. Nested objects/arrays are first
 * flattened into indented `key: value` text.
 */

import type { JsonValue, StructuredValue, TextContent } from '../models/print-job.model';

// ── Constants ──

export const TAB_SIZE = 4;

/** Two spaces per nesting level in flattened structures */
const INDENT = '  ';

// ── Structured input ──

function isStructured(value: JsonValue): value is StructuredValue {
  return typeof value === 'object' && value !== null;
}

function scalarToString(value: string | number | boolean | null): string {
  return value === null ? 'null' : String(value);
}

function flattenInto(value: StructuredValue, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  if (Array.isArray(value)) {
    for (const item of value) {
      if (isStructured(item)) {
        flattenInto(item, depth, out);
      } else {
        out.push(pad + scalarToString(item));
      }
    }
    return;
  }

  for (const [key, item] of Object.entries(value)) {
    if (isStructured(item)) {
      out.push(`${pad}${key}:`);
      flattenInto(item, depth + 1, out);
    } else {
      out.push(`${pad}${key}: ${scalarToString(item)}`);
    }
  }
}

/** Flatten a nested object/array into plain text, one entry per line */
export function flattenStructured(value: StructuredValue): string {
  const out: string[] = [];
  flattenInto(value, 0, out);
  return out.join('\n');
}

/** Display text for any request content */
export function toDisplayText(content: TextContent): string {
  return typeof content === 'string' ? content : flattenStructured(content);
}

// ── Line splitting ──

/** Expand tabs to the next multiple of TAB_SIZE columns; one column per code point */
export function expandTabs(line: string, tabSize = TAB_SIZE): string {
  let out = '';
  let column = 0;
  for (const ch of line) {
    if (ch === '\t') {
      const pad = tabSize - (column % tabSize);
      out += ' '.repeat(pad);
      column += pad;
    } else {
      out += ch;
      column++;
    }
  }
  return out;
}

/**
 * Greedy word wrap. Leading indentation of the line is kept on its first
 * output line; whitespace at the start and end of wrapped lines is dropped.
 * Words longer than the column count are broken to fill the current line.
 * Widths count code points, matching the one-glyph-per-column drawing.
 */
export function wrapLine(line: string, columns: number): string[] {
  const width = Math.max(1, columns);
  const chunks = (line.match(/\s+|\S+/g) ?? []).map((chunk) => Array.from(chunk));
  const isSpace = (chunk: readonly string[]) => chunk.join('').trim() === '';
  const lines: string[] = [];
  let current: string[][] = [];
  let currentLen = 0;
  let first = true;

  const flush = (): void => {
    while (current.length > 0 && isSpace(current[current.length - 1])) {
      current.pop();
    }
    if (current.length > 0) {
      lines.push(current.map((chunk) => chunk.join('')).join(''));
    }
    current = [];
    currentLen = 0;
    first = false;
  };

  let i = 0;
  while (i < chunks.length) {
    const chunk = chunks[i];
    const space = isSpace(chunk);

    // Whitespace never starts a wrapped line, only the original one
    if (space && currentLen === 0 && !first) {
      i++;
      continue;
    }

    if (currentLen + chunk.length <= width) {
      current.push(chunk);
      currentLen += chunk.length;
      i++;
      continue;
    }

    if (space) {
      i++;
      flush();
      continue;
    }

    if (chunk.length > width) {
      const room = width - currentLen;
      if (room > 0) {
        current.push(chunk.slice(0, room));
        chunks[i] = chunk.slice(room);
      }
    }
    flush();
  }
  flush();

  return lines.length > 0 ? lines : [''];
}

/**
 * Split display text into output lines for the given column count.
 * Blank and whitespace-only lines are kept as empty lines.
 */
export function splitTextLines(text: string, columns: number): string[] {
  const out: string[] = [];
  for (const raw of text.split('\n')) {
    const line = expandTabs(raw);
    if (line.trim() === '') {
      out.push('');
      continue;
    }
    out.push(...wrapLine(line, columns));
  }
  return out;
}
