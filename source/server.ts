// source/server.ts
// node:http request listener mounting the handler under a path prefix.

import path from 'node:path';
import { handler, setPathWithinMapping } from './handler/index.js';
import { MethodNotSupportedError } from './handler/errors.js';
import { logger } from './utilities/logger.js';
import type { IncomingMessage } from 'node:http';
import type { HandlerConfig } from './handler/config.js';
import type { ResponseSink } from './handler/content.js';
import type { HandlerRequest } from './handler/index.js';

export interface ListenerOptions {
  /** URL path the resources are mounted at, `/` by default. */
  prefix?: string;
}

export type ListenerRequest = HandlerRequest & Pick<IncomingMessage, 'url'>;

export type ListenerResponse = ResponseSink;

interface ErrorReply {
  statusCode: number;
  code: string;
  message: string;
}

const normalizePrefix = (prefix: string): string => {
  const normalized = path.posix.normalize(path.posix.join('/', prefix));
  return normalized.endsWith('/') ? normalized : `${normalized}/`;
};

const parsePathname = (url: string | undefined): string | null => {
  try {
    return new URL(url ?? '/', 'http://localhost').pathname;
  } catch (err: unknown) {
    logger.debug(`Unparseable request target "${url ?? ''}": ${String(err)}`);
    return null;
  }
};

const sendError = (
  request: ListenerRequest,
  response: ListenerResponse,
  reply: ErrorReply,
): void => {
  const { statusCode, code, message } = reply;
  const acceptsJSON = request.headers.accept?.includes('application/json');

  response.statusCode = statusCode;

  if (acceptsJSON) {
    response.setHeader('Content-Type', 'application/json; charset=utf-8');
    response.end(JSON.stringify({ error: { code, message } }));
    return;
  }

  response.setHeader('Content-Type', 'text/plain; charset=utf-8');
  response.end(message);
};

/**
 * Extracts the path-within-mapping from the request URL, hands the request
 * to the handler, and turns its typed failures into responses.
 */
export const createRequestListener = (
  config: HandlerConfig,
  options: ListenerOptions = {},
) => {
  const prefix = normalizePrefix(options.prefix ?? '/');

  return async (
    request: ListenerRequest,
    response: ListenerResponse,
  ): Promise<void> => {
    const pathname = parsePathname(request.url);

    if (pathname === null || !pathname.startsWith(prefix)) {
      sendError(request, response, {
        statusCode: 404,
        code: 'not_found',
        message: 'The requested path could not be found',
      });
      return;
    }

    setPathWithinMapping(request, pathname.slice(prefix.length));

    try {
      await handler(request, response, config);
    } catch (err: unknown) {
      if (err instanceof MethodNotSupportedError) {
        response.setHeader('Allow', err.supportedMethods.join(', '));
        sendError(request, response, {
          statusCode: 405,
          code: 'method_not_allowed',
          message: err.message,
        });
        return;
      }

      logger.error(String(err));

      if (response.headersSent) {
        response.destroy();
        return;
      }

      sendError(request, response, {
        statusCode: 500,
        code: 'internal_server_error',
        message: 'A server error has occurred',
      });
    }
  };
};
