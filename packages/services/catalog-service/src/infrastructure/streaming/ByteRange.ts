/**
 * Single byte-range parsing and response planning for partial-content delivery.
 */

export type RangeRequest =
  | { kind: 'none' }
  | { kind: 'invalid'; header: string }
  | { kind: 'unsatisfiable'; header: string }
  | { kind: 'range'; start: number; end: number };

const SINGLE_RANGE = /^bytes\s*=\s*(\d*)\s*-\s*(\d*)\s*$/i;

function toOffset(digits: string): number | null {
  if (digits === '') return null;
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : Number.NaN;
}

/**
 * Parses `bytes=<start>-<end>`. An omitted start means 0 and an omitted end means the
 * last byte. Multiple ranges and other units are `invalid`; a start at or past the end
 * of the file, or past the requested end, is `unsatisfiable`. The end is clamped to the
 * last byte.
 */
export function parseRangeHeader(header: string | undefined, size: number): RangeRequest {
  if (header === undefined) {
    return { kind: 'none' };
  }

  const match = SINGLE_RANGE.exec(header.trim());
  if (!match) {
    return { kind: 'invalid', header };
  }

  const start = toOffset(match[1]) ?? 0;
  const requestedEnd = toOffset(match[2]);
  if (Number.isNaN(start) || (requestedEnd !== null && Number.isNaN(requestedEnd))) {
    return { kind: 'invalid', header };
  }
  if (start >= size || (requestedEnd !== null && requestedEnd < start)) {
    return { kind: 'unsatisfiable', header };
  }

  const end = requestedEnd === null ? size - 1 : Math.min(requestedEnd, size - 1);
  return { kind: 'range', start, end };
}

export interface ByteSpan {
  start: number;
  end: number;
}

export interface RangeResponsePlan {
  status: 200 | 206 | 416;
  headers: Record<string, string>;
  /** Inclusive span to send, or `null` for an empty body. */
  body: ByteSpan | null;
}

export function planRangeResponse(range: RangeRequest, size: number, contentType: string): RangeResponsePlan {
  const headers: Record<string, string> = {
    'Content-Type': contentType,
    'Accept-Ranges': 'bytes',
    'Cache-Control': 'no-cache',
  };

  if (range.kind === 'unsatisfiable') {
    return {
      status: 416,
      headers: { ...headers, 'Content-Range': `bytes */${size}`, 'Content-Length': '0' },
      body: null,
    };
  }

  if (range.kind === 'range') {
    return {
      status: 206,
      headers: {
        ...headers,
        'Content-Range': `bytes ${range.start}-${range.end}/${size}`,
        'Content-Length': String(range.end - range.start + 1),
      },
      body: { start: range.start, end: range.end },
    };
  }

  if (size === 0) {
    return { status: 200, headers: { ...headers, 'Content-Length': '0' }, body: null };
  }

  return {
    status: 200,
    headers: { ...headers, 'Content-Range': `bytes 0-${size - 1}/${size}`, 'Content-Length': String(size) },
    body: { start: 0, end: size - 1 },
  };
}
