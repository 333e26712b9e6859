import { statSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { setPathWithinMapping } from '../../source/handler/index.js';
import type { IncomingHttpHeaders } from 'node:http';
import type { HandlerRequest } from '../../source/handler/index.js';

const fixturesRoot = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'fixtures',
);

export const fixture = (...segments: string[]): string =>
  path.join(fixturesRoot, ...segments);

export const lastModifiedOf = (...segments: string[]): number =>
  statSync(fixture(...segments)).mtime.getTime();

export const createRequest = (
  pathWithinMapping?: string,
  headers: IncomingHttpHeaders = {},
  method = 'GET',
): HandlerRequest => {
  const request: HandlerRequest = { method, headers };
  if (pathWithinMapping !== undefined) {
    setPathWithinMapping(request, pathWithinMapping);
  }
  return request;
};
