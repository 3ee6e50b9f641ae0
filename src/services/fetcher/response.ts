import { FetchError } from '../../errors/app-error.js';

interface BodyResponse {
  readonly headers: { get(name: string): string | null };
  readonly body: ReadableStream<Uint8Array> | null;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function createOversizeError(url: string, maxBytes: number): FetchError {
  return new FetchError(
    `Response exceeds maximum size of ${maxBytes} bytes`,
    url,
    413,
    { maxBytes }
  );
}

function assertContentLengthWithinLimit(
  response: BodyResponse,
  url: string,
  maxBytes: number
): void {
  const contentLengthHeader = response.headers.get('content-length');
  if (!contentLengthHeader) return;
  const contentLength = Number.parseInt(contentLengthHeader, 10);
  if (Number.isNaN(contentLength) || contentLength <= maxBytes) {
    return;
  }

  throw createOversizeError(url, maxBytes);
}

async function readStreamWithLimit(
  stream: ReadableStream<Uint8Array>,
  url: string,
  maxBytes: number,
  signal?: AbortSignal
): Promise<{ body: Uint8Array; size: number }> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    for (;;) {
      signal?.throwIfAborted();
      const { value, done } = await reader.read();
      if (done) break;
      total += value.byteLength;

      if (total > maxBytes) {
        await reader.cancel();
        throw createOversizeError(url, maxBytes);
      }

      chunks.push(value);
    }

    return { body: Buffer.concat(chunks, total), size: total };
  } finally {
    reader.releaseLock();
  }
}

export async function readResponseBytes(
  response: BodyResponse,
  url: string,
  maxBytes: number,
  signal?: AbortSignal
): Promise<{ body: Uint8Array; size: number }> {
  assertContentLengthWithinLimit(response, url, maxBytes);

  if (!response.body) {
    const body = new Uint8Array(await response.arrayBuffer());
    if (body.byteLength > maxBytes) throw createOversizeError(url, maxBytes);
    return { body, size: body.byteLength };
  }

  return readStreamWithLimit(response.body, url, maxBytes, signal);
}
