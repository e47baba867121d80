export interface MultipartFieldPart {
  name: string;
  value: string;
}

export interface MultipartFilePart {
  name: string;
  filename: string;
  data: Buffer;
  contentType?: string;
}

export type MultipartPart = MultipartFieldPart | MultipartFilePart;

/**
 * Encodes parts the way browsers do: CRLF line endings and a closing `--boundary--` line.
 */
export function buildMultipartBody(boundary: string, parts: MultipartPart[]): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    chunks.push(Buffer.from(`--${boundary}\r\n`));
    if ('filename' in part) {
      chunks.push(
        Buffer.from(
          `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\n` +
            `Content-Type: ${part.contentType ?? 'application/octet-stream'}\r\n\r\n`
        )
      );
      chunks.push(part.data);
    } else {
      chunks.push(Buffer.from(`Content-Disposition: form-data; name="${part.name}"\r\n\r\n${part.value}`));
    }
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(chunks);
}

/**
 * Builds a raw-sample file: u32 LE sample rate, u16 LE channel count, then PCM bytes.
 */
export function buildRawSampleFile(sampleRate: number, channels: number, pcm: Buffer): Buffer {
  const header = Buffer.alloc(6);
  header.writeUInt32LE(sampleRate, 0);
  header.writeUInt16LE(channels, 4);
  return Buffer.concat([header, pcm]);
}

/** Deterministic bytes 0..255 repeating, handy for range assertions. */
export function sequentialBytes(length: number): Buffer {
  const data = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    data[i] = i % 256;
  }
  return data;
}
