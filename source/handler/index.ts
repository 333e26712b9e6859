// source/handler/index.ts
// Static resource handler: resolution, conditional requests and byte ranges.

import { formatHttpDate, parseHttpDate } from '../utilities/http-date.js';
import { logger } from '../utilities/logger.js';
import { applyHeaders, cacheHeaders } from './cache-control.js';
import { evaluateConditional } from './conditional.js';
import { writeContent } from './content.js';
import { ConfigurationError, MethodNotSupportedError } from './errors.js';
import { resolveMediaType } from './media-type.js';
import { processPath } from './path.js';
import {
  contentRange,
  generateBoundary,
  multipartContentType,
  multipartLength,
  processRanges,
  rangeLength,
  unsatisfiedRange,
} from './ranges.js';
import { resolveResource } from './resolvers.js';
import type { IncomingMessage } from 'node:http';
import type { HandlerConfig } from './config.js';
import type { ResponseSink } from './content.js';
import type { RangeOutcome } from './ranges.js';
import type { Resource } from './resources.js';

export const SUPPORTED_METHODS: readonly string[] = Object.freeze([
  'GET',
  'HEAD',
]);

export type HandlerRequest = Pick<IncomingMessage, 'method' | 'headers'>;

const pathsWithinMapping = new WeakMap<HandlerRequest, string>();

/**
 * Attaches the part of the request path that the dispatcher matched
 * against this handler's mapping, e.g. `css/site.css` for
 * `/static/css/site.css` mapped at `/static/`.
 */
export const setPathWithinMapping = (
  request: HandlerRequest,
  value: string,
): void => {
  pathsWithinMapping.set(request, value);
};

export const getPathWithinMapping = (
  request: HandlerRequest,
): string | undefined => pathsWithinMapping.get(request);

const checkRequest = (request: HandlerRequest): string => {
  const method = request.method ?? '';

  if (!SUPPORTED_METHODS.includes(method)) {
    throw new MethodNotSupportedError(method, SUPPORTED_METHODS);
  }

  return method;
};

const requirePathWithinMapping = (request: HandlerRequest): string => {
  const rawPath = getPathWithinMapping(request);

  if (rawPath === undefined) {
    throw new ConfigurationError(
      'Required path-within-mapping is not set on the request',
    );
  }

  return rawPath;
};

const resolvePath = (
  rawPath: string,
  config: HandlerConfig,
): Promise<Resource | null> =>
  resolveResource(
    config.resolvers,
    processPath(rawPath),
    config.locations,
    { handlers: config.handlers, symlinks: config.symlinks },
  );

/** Resolves the resource for a request, or `null` when there is none. */
export const getResource = async (
  request: HandlerRequest,
  config: HandlerConfig,
): Promise<Resource | null> =>
  resolvePath(requirePathWithinMapping(request), config);

const setContentHeaders = (
  response: ResponseSink,
  contentLength: number,
  mediaType: string | undefined,
): void => {
  response.setHeader('Content-Length', contentLength);
  if (mediaType) {
    response.setHeader('Content-Type', mediaType);
  }
  response.setHeader('Accept-Ranges', 'bytes');
};

const endWithStatus = (response: ResponseSink, statusCode: number): void => {
  response.statusCode = statusCode;
  response.end();
};

const writePartialContent = async (
  response: ResponseSink,
  resource: Resource,
  outcome: Exclude<RangeOutcome, { type: 'none' }>,
  mediaType: string | undefined,
): Promise<void> => {
  const { length } = resource;

  switch (outcome.type) {
    case 'unsatisfiable':
      response.setHeader('Content-Range', unsatisfiedRange(length));
      endWithStatus(response, 416);
      return;
    case 'single': {
      const { range } = outcome;
      setContentHeaders(response, rangeLength(range), mediaType);
      response.setHeader('Content-Range', contentRange(range, length));
      response.statusCode = 206;
      await writeContent(response, resource, { type: 'single', range });
      return;
    }
    case 'multipart': {
      const { ranges } = outcome;
      const boundary = generateBoundary();
      setContentHeaders(
        response,
        multipartLength(boundary, ranges, length, mediaType),
        multipartContentType(boundary),
      );
      response.statusCode = 206;
      await writeContent(response, resource, {
        type: 'multipart',
        ranges,
        boundary,
        contentType: mediaType,
      });
      return;
    }
  }
};

/**
 * Serves a GET or HEAD request for a static resource.
 *
 * Throws `ConfigurationError` when no path-within-mapping was attached to
 * the request and `MethodNotSupportedError` for other methods; everything
 * else ends in a 200, 206, 304, 404 or 416 response.
 */
export const handler = async (
  request: HandlerRequest,
  response: ResponseSink,
  config: HandlerConfig,
): Promise<void> => {
  const rawPath = requirePathWithinMapping(request);
  const method = checkRequest(request);
  const resource = await resolvePath(rawPath, config);

  if (!resource) {
    logger.debug('No matching resource found - returning 404');
    endWithStatus(response, 404);
    return;
  }

  const { lastModified, length } = resource;

  if (lastModified !== undefined) {
    response.setHeader('Last-Modified', formatHttpDate(lastModified));
  }

  const ifModifiedSince = parseHttpDate(request.headers['if-modified-since']);

  if (evaluateConditional(lastModified, ifModifiedSince) === 'not-modified') {
    logger.debug(`${resource.description} not modified - returning 304`);
    endWithStatus(response, 304);
    return;
  }

  applyHeaders(response, cacheHeaders(config.cachePolicy, Date.now()));

  const mediaType = resolveMediaType(resource.name, config.mediaTypes);

  if (method === 'HEAD') {
    setContentHeaders(response, length, mediaType);
    endWithStatus(response, 200);
    return;
  }

  const outcome: RangeOutcome =
    length > 0
      ? processRanges(request.headers.range, length)
      : { type: 'none' };

  if (outcome.type !== 'none') {
    await writePartialContent(response, resource, outcome, mediaType);
    return;
  }

  setContentHeaders(response, length, mediaType);
  response.statusCode = 200;
  await writeContent(response, resource, { type: 'full' });
};
