/**
 * multipart/form-data decoding for song uploads.
 *
 * Works directly on the request body buffer: parts are yielded as views into it, so the
 * payload is never copied before the file is written.
 */

const CRLF = Buffer.from('\r\n');
const HEADER_SEPARATOR = Buffer.from('\r\n\r\n');
const CLOSE_MARKER = Buffer.from('--');

const DISPOSITION_PARAM = /;\s*([a-z*]+)\s*=\s*(?:"([^"]*)"|([^;\s]*))/gi;

export interface MultipartFile {
  filename: string;
  data: Buffer;
}

export interface MultipartResult {
  fields: Record<string, string>;
  file: MultipartFile | null;
}

interface PartDisposition {
  name: string | null;
  filename: string | null;
}

/**
 * Parts between consecutive `--boundary` delimiters. Bytes before the first delimiter
 * (the preamble) are not a part.
 */
function* splitParts(body: Buffer, delimiter: Buffer): Generator<Buffer> {
  let position = body.indexOf(delimiter);
  if (position === -1) return;
  position += delimiter.length;

  while (position <= body.length) {
    const next = body.indexOf(delimiter, position);
    if (next === -1) {
      yield body.subarray(position);
      return;
    }
    yield body.subarray(position, next);
    position = next + delimiter.length;
  }
}

function isTerminator(part: Buffer): boolean {
  if (!part.subarray(0, CLOSE_MARKER.length).equals(CLOSE_MARKER)) return false;
  const rest = part.subarray(CLOSE_MARKER.length);
  return rest.length === 0 || rest.equals(CRLF);
}

function parseDisposition(headerText: string): PartDisposition {
  const line = headerText.split(/\r?\n/).find(l => l.toLowerCase().startsWith('content-disposition'));
  const disposition: PartDisposition = { name: null, filename: null };
  if (!line) return disposition;

  for (const match of line.matchAll(DISPOSITION_PARAM)) {
    const key = match[1].toLowerCase();
    const value = match[2] ?? match[3] ?? '';
    if (key === 'name') disposition.name = value;
    else if (key === 'filename') disposition.filename = value;
  }
  return disposition;
}

/**
 * Decodes a multipart body into text fields and at most one file.
 *
 * Malformed parts (no blank line after the headers), empty parts and the closing
 * `--` marker are skipped. Only the first part carrying a filename is kept as the file.
 * Repeated field names keep the last value. Invalid UTF-8 in fields decodes to U+FFFD.
 */
export function decodeMultipart(body: Buffer, boundary: string): MultipartResult {
  const result: MultipartResult = { fields: {}, file: null };
  if (!boundary) return result;

  for (const rawPart of splitParts(body, Buffer.from(`--${boundary}`))) {
    if (rawPart.length === 0 || isTerminator(rawPart)) continue;

    const part = rawPart.subarray(0, CRLF.length).equals(CRLF) ? rawPart.subarray(CRLF.length) : rawPart;
    const separatorAt = part.indexOf(HEADER_SEPARATOR);
    if (separatorAt === -1) continue;

    const { name, filename } = parseDisposition(part.subarray(0, separatorAt).toString('utf8'));
    let content = part.subarray(separatorAt + HEADER_SEPARATOR.length);
    if (content.subarray(content.length - CRLF.length).equals(CRLF)) {
      content = content.subarray(0, content.length - CRLF.length);
    }

    if (filename) {
      if (!result.file) result.file = { filename, data: content };
    } else if (name && filename === null) {
      result.fields[name] = content.toString('utf8');
    }
  }

  return result;
}

export function isMultipartFormData(contentType: string | undefined): boolean {
  return (contentType ?? '').toLowerCase().includes('multipart/form-data');
}

/**
 * The `boundary` parameter of a content type, unquoted, or `null` when absent or empty.
 */
export function extractBoundary(contentType: string | undefined): string | null {
  for (const segment of (contentType ?? '').split(';').slice(1)) {
    const [key, ...valueParts] = segment.split('=');
    if (key.trim().toLowerCase() !== 'boundary') continue;
    const value = valueParts.join('=').trim().replace(/^"(.*)"$/, '$1');
    return value || null;
  }
  return null;
}
