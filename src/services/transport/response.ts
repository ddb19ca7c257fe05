import { addAbortSignal, Readable } from 'node:stream';

export interface BodyReadResult {
  body: string;
  bytes: Buffer;
  size: number;
  truncated: boolean;
  /** Set when the stream failed part way; `bytes` holds what arrived. */
  error?: unknown;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (chunk instanceof ArrayBuffer) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

function finish(parts: Buffer[], maxBytes: number | undefined): BodyReadResult {
  const full = Buffer.concat(parts);
  const truncated = maxBytes !== undefined && full.length > maxBytes;
  const kept = truncated ? full.subarray(0, maxBytes) : full;
  return {
    body: kept.toString('utf8'),
    bytes: kept,
    size: kept.length,
    truncated,
  };
}

async function readStream(
  stream: Readable,
  maxBytes: number | undefined,
  signal: AbortSignal | undefined
): Promise<BodyReadResult> {
  const parts: Buffer[] = [];
  let total = 0;

  if (signal) addAbortSignal(signal, stream);

  try {
    // Leaving the loop early destroys the stream, so the rest of an oversized
    // body is never downloaded.
    for await (const chunk of stream) {
      const buffer = toBuffer(chunk);
      parts.push(buffer);
      total += buffer.length;
      if (maxBytes !== undefined && total > maxBytes) break;
    }
  } catch (error) {
    return { ...finish(parts, maxBytes), error };
  }

  return finish(parts, maxBytes);
}

/**
 * Reads a response body of any shape an axios adapter may hand back, keeping
 * at most `maxBytes` bytes. Stream failures do not reject: the bytes read so
 * far are returned together with the error.
 */
export async function readResponseBody(
  data: unknown,
  maxBytes?: number,
  signal?: AbortSignal
): Promise<BodyReadResult> {
  if (data === null || data === undefined || data === '') {
    return finish([], maxBytes);
  }
  if (data instanceof Readable) {
    return readStream(data, maxBytes, signal);
  }
  if (typeof data === 'string' || data instanceof Uint8Array) {
    return finish([toBuffer(data)], maxBytes);
  }
  if (data instanceof ArrayBuffer) {
    return finish([Buffer.from(data)], maxBytes);
  }
  return finish([Buffer.from(JSON.stringify(data))], maxBytes);
}
