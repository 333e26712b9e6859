// source/handler/content.ts
// Streams resource bytes into the response.

import { pipeline } from 'node:stream/promises';
import { logger } from '../utilities/logger.js';
import { ResourceNotFoundError } from './errors.js';
import { closingDelimiter, partHeader } from './ranges.js';
import type { Readable, Writable } from 'node:stream';
import type { ResolvedRange } from './ranges.js';
import type { ByteSource, ByteWindow, Resource } from './resources.js';

/** The part of `ServerResponse` the handler writes to. */
export interface ResponseSink extends Writable {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader: (
    name: string,
    value: number | string | readonly string[],
  ) => unknown;
  getHeader: (name: string) => number | string | string[] | undefined;
  removeHeader: (name: string) => void;
}

export type ContentBody =
  | { type: 'full' }
  | { type: 'single'; range: ResolvedRange }
  | {
      type: 'multipart';
      ranges: readonly ResolvedRange[];
      boundary: string;
      contentType?: string | undefined;
    };

/**
 * Releases a byte source. A failing close is logged and dropped: the bytes
 * have been written by then and the response must stay as produced.
 */
const release = async (
  source: ByteSource,
  description: string,
): Promise<void> => {
  try {
    await source.close();
  } catch (err: unknown) {
    logger.debug(`Could not close ${description}: ${String(err)}`);
  }
};

/** Opens a byte source, hands its stream to `use`, and always releases it. */
const withByteSource = async <T>(
  resource: Resource,
  window: ByteWindow | undefined,
  use: (stream: Readable) => Promise<T>,
): Promise<T> => {
  const source = await resource.open(window);

  try {
    return await use(source.stream);
  } finally {
    await release(source, resource.description);
  }
};

interface Part {
  range: ResolvedRange;
  source: ByteSource;
}

const releaseParts = async (
  parts: readonly Part[],
  description: string,
): Promise<void> => {
  for (const { source } of parts) {
    await release(source, description);
  }
};

/** Every window is opened before the first byte of framing is written. */
const openParts = async (
  resource: Resource,
  ranges: readonly ResolvedRange[],
): Promise<Part[]> => {
  const parts: Part[] = [];

  try {
    for (const range of ranges) {
      parts.push({ range, source: await resource.open(range) });
    }
  } catch (err: unknown) {
    await releaseParts(parts, resource.description);
    throw err;
  }

  return parts;
};

async function* multipartChunks(
  resource: Resource,
  body: Extract<ContentBody, { type: 'multipart' }>,
  parts: readonly Part[],
): AsyncGenerator<Buffer> {
  const { boundary, contentType } = body;

  for (const { range, source } of parts) {
    yield Buffer.from(
      partHeader(boundary, range, resource.length, contentType),
    );
    yield* source.stream;
  }

  yield Buffer.from(closingDelimiter(boundary));
}

/**
 * Writes the body of a resource and ends the response. Never rejects: a
 * resource that can no longer be opened leaves the status as it is, drops
 * `Content-Length` and writes nothing.
 */
export const writeContent = async (
  response: ResponseSink,
  resource: Resource,
  body: ContentBody = { type: 'full' },
): Promise<void> => {
  try {
    switch (body.type) {
      case 'full':
        await withByteSource(resource, undefined, (stream) =>
          pipeline(stream, response),
        );
        break;
      case 'single':
        await withByteSource(resource, body.range, (stream) =>
          pipeline(stream, response),
        );
        break;
      case 'multipart': {
        const parts = await openParts(resource, body.ranges);

        try {
          await pipeline(multipartChunks(resource, body, parts), response);
        } finally {
          await releaseParts(parts, resource.description);
        }
        break;
      }
    }
  } catch (err: unknown) {
    if (err instanceof ResourceNotFoundError) {
      logger.debug(`${resource.description} is gone, nothing written`);
      // The announced length no longer holds once the body is empty.
      if (!response.headersSent) {
        response.removeHeader('Content-Length');
      }
    } else {
      logger.error(`Failed to write ${resource.description}: ${String(err)}`);
    }
  } finally {
    if (!response.writableEnded && !response.destroyed) {
      response.end();
    }
  }
};
