// source/handler/config.ts
// One-time build step producing the immutable handler configuration.

import { z } from 'zod';
import { logger } from '../utilities/logger.js';
import { ConfigurationError, isMissingEntry } from './errors.js';
import { pathResolver } from './resolvers.js';
import { describeLocation, getHandlers } from './resources.js';
import type { CachePolicy } from './cache-control.js';
import type { ResourceResolver } from './resolvers.js';
import type { FileSystemHandlers, Location } from './resources.js';

export interface HandlerOptions {
  /** Ordered; the first location holding the path wins. */
  locations: readonly Location[];
  /** Defaults to a single path resolver. */
  resolvers?: readonly ResourceResolver[];
  cacheSeconds?: number;
  useExpiresHeader?: boolean;
  useCacheControlHeader?: boolean;
  useCacheControlNoStore?: boolean;
  alwaysMustRevalidate?: boolean;
  cacheControl?: string;
  /** Extension (without dot) to media type, consulted before `mime-types`. */
  mediaTypes?: Record<string, string>;
  symlinks?: boolean;
  handlers?: FileSystemHandlers;
}

export interface HandlerConfig {
  readonly locations: readonly Location[];
  readonly resolvers: readonly ResourceResolver[];
  readonly cachePolicy: CachePolicy;
  readonly mediaTypes: Readonly<Record<string, string>>;
  readonly symlinks: boolean;
  readonly handlers: FileSystemHandlers;
}

const optionsSchema = z.object({
  cacheSeconds: z.number().int().default(-1),
  useExpiresHeader: z.boolean().optional(),
  useCacheControlHeader: z.boolean().optional(),
  useCacheControlNoStore: z.boolean().optional(),
  alwaysMustRevalidate: z.boolean().optional(),
  cacheControl: z.string().min(1).optional(),
  mediaTypes: z
    .record(
      z.string().min(1),
      z.string().regex(/^[\w.+-]+\/[\w.+-]+(?:\s*;.*)?$/, 'Invalid media type'),
    )
    .default({}),
  symlinks: z.boolean().default(true),
});

type ParsedOptions = z.infer<typeof optionsSchema>;

const toCachePolicy = (parsed: ParsedOptions): CachePolicy =>
  Object.freeze({
    cacheSeconds: parsed.cacheSeconds,
    useExpiresHeader: parsed.useExpiresHeader ?? false,
    useCacheControlHeader: parsed.useCacheControlHeader ?? true,
    useCacheControlNoStore: parsed.useCacheControlNoStore ?? true,
    alwaysMustRevalidate: parsed.alwaysMustRevalidate ?? false,
    legacy:
      parsed.useExpiresHeader !== undefined ||
      parsed.useCacheControlHeader !== undefined ||
      parsed.useCacheControlNoStore !== undefined ||
      parsed.alwaysMustRevalidate !== undefined,
    cacheControl: parsed.cacheControl,
  });

const toMediaTypes = (
  mediaTypes: Record<string, string>,
): Readonly<Record<string, string>> => {
  const normalized: Record<string, string> = {};

  for (const [extension, type] of Object.entries(mediaTypes)) {
    normalized[extension.replace(/^\./, '').toLowerCase()] = type;
  }

  return Object.freeze(normalized);
};

const canonicalize = async (
  location: Location,
  handlers: FileSystemHandlers,
): Promise<Location> => {
  if (location.kind !== 'directory') {
    return Object.freeze({ ...location });
  }

  try {
    const canonical: Location = {
      kind: 'directory',
      root: await handlers.realpath(location.root),
    };
    return Object.freeze(canonical);
  } catch (err: unknown) {
    if (!isMissingEntry(err)) {
      throw new ConfigurationError(
        `Cannot access ${describeLocation(location)}: ${String(err)}`,
      );
    }

    logger.warn(`${describeLocation(location)} does not exist`);
    return Object.freeze({ ...location });
  }
};

const canonicalizeAll = async (
  locations: readonly Location[],
  handlers: FileSystemHandlers,
): Promise<readonly Location[]> =>
  Object.freeze(
    await Promise.all(
      locations.map((location) => canonicalize(location, handlers)),
    ),
  );

/**
 * Path resolvers without an explicit allow-list get every configured
 * location; an explicit list is kept, only canonicalized.
 */
const initAllowedLocations = async (
  resolvers: readonly ResourceResolver[],
  locations: readonly Location[],
  handlers: FileSystemHandlers,
): Promise<readonly ResourceResolver[]> => {
  const initialized: ResourceResolver[] = [];

  for (const resolver of resolvers) {
    switch (resolver.kind) {
      case 'path':
        initialized.push(
          Object.freeze(
            pathResolver(
              resolver.allowedLocations
                ? await canonicalizeAll(resolver.allowedLocations, handlers)
                : locations,
            ),
          ),
        );
        break;
    }
  }

  return Object.freeze(initialized);
};

export const createHandlerConfig = async (
  options: HandlerOptions,
): Promise<HandlerConfig> => {
  const result = optionsSchema.safeParse(options);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid handler options: ${issues}`);
  }

  if (!Array.isArray(options.locations)) {
    throw new ConfigurationError(
      'Invalid handler options: locations is required',
    );
  }

  const parsed = result.data;
  const handlers = options.handlers ?? getHandlers();
  const locations = await canonicalizeAll(options.locations, handlers);

  if (locations.length === 0) {
    logger.warn(
      'Locations list is empty. No resources will be served unless a custom resolver is configured.',
    );
  }

  const resolvers = await initAllowedLocations(
    options.resolvers ?? [pathResolver()],
    locations,
    handlers,
  );

  return Object.freeze({
    locations,
    resolvers,
    cachePolicy: toCachePolicy(parsed),
    mediaTypes: toMediaTypes(parsed.mediaTypes),
    symlinks: parsed.symlinks,
    handlers,
  });
};
