// source/index.ts

export {
  handler,
  getResource,
  getPathWithinMapping,
  setPathWithinMapping,
  SUPPORTED_METHODS,
} from './handler/index.js';
export type { HandlerRequest } from './handler/index.js';
export { createHandlerConfig } from './handler/config.js';
export type { HandlerConfig, HandlerOptions } from './handler/config.js';
export {
  archiveLocation,
  directoryLocation,
  getHandlers,
} from './handler/resources.js';
export type {
  ArchiveLocation,
  ByteSource,
  ByteWindow,
  DirectoryLocation,
  FileSystemHandlers,
  Location,
  Resource,
} from './handler/resources.js';
export { archiveFromAssets, createArchive } from './handler/archive.js';
export type { Archive, ArchiveEntry, ArchiveFile } from './handler/archive.js';
export { pathResolver, resolveResource } from './handler/resolvers.js';
export type {
  PathResourceResolver,
  ResourceResolver,
} from './handler/resolvers.js';
export { processPath, isInvalidPath } from './handler/path.js';
export { processRanges } from './handler/ranges.js';
export type { RangeOutcome, ResolvedRange } from './handler/ranges.js';
export { cacheHeaders } from './handler/cache-control.js';
export type { CachePolicy, HeaderEntry } from './handler/cache-control.js';
export { evaluateConditional } from './handler/conditional.js';
export { writeContent } from './handler/content.js';
export type { ContentBody, ResponseSink } from './handler/content.js';
export {
  ConfigurationError,
  HandlerError,
  MethodNotSupportedError,
  ResourceNotFoundError,
} from './handler/errors.js';
export { createRequestListener } from './server.js';
export type {
  ListenerOptions,
  ListenerRequest,
  ListenerResponse,
} from './server.js';
