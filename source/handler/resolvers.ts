// source/handler/resolvers.ts
// Resolver chain turning a processed path into a resource.

import { logger } from '../utilities/logger.js';
import { decodePath, isInvalidPath } from './path.js';
import {
  createRelative,
  describeLocation,
  isUnderLocation,
} from './resources.js';
import type { FileSystemHandlers, Location, Resource } from './resources.js';

/**
 * Looks the path up relative to each location. Resources outside both the
 * location they were found in and every allowed location are refused.
 */
export interface PathResourceResolver {
  readonly kind: 'path';
  readonly allowedLocations?: readonly Location[] | undefined;
}

export type ResourceResolver = PathResourceResolver;

export interface ResolveContext {
  readonly handlers: FileSystemHandlers;
  readonly symlinks: boolean;
}

export const pathResolver = (
  allowedLocations?: readonly Location[],
): PathResourceResolver =>
  allowedLocations ? { kind: 'path', allowedLocations } : { kind: 'path' };

const checkResource = (
  resource: Resource,
  location: Location,
  allowedLocations: readonly Location[] | undefined,
): boolean => {
  if (!isUnderLocation(resource, location)) {
    return false;
  }

  if (!allowedLocations) {
    return true;
  }

  return allowedLocations.some((allowed) => isUnderLocation(resource, allowed));
};

const lookup = async (
  location: Location,
  requestPath: string,
  context: ResolveContext,
): Promise<Resource | null> => {
  try {
    return await createRelative(
      location,
      requestPath,
      context.handlers,
      context.symlinks,
    );
  } catch (err: unknown) {
    logger.error(
      `Failed to look up "${requestPath}" in ${describeLocation(location)}: ${String(err)}`,
    );
    return null;
  }
};

const resolveWithPathResolver = async (
  resolver: PathResourceResolver,
  requestPath: string,
  locations: readonly Location[],
  context: ResolveContext,
): Promise<Resource | null> => {
  if (requestPath === '' || isInvalidPath(requestPath)) {
    logger.debug(`Rejected request path "${requestPath}"`);
    return null;
  }

  const decoded = decodePath(requestPath);

  if (decoded === null) {
    logger.debug(`Ignoring invalid escape sequence in "${requestPath}"`);
    return null;
  }

  if (decoded !== requestPath && isInvalidPath(decoded)) {
    logger.debug(`Rejected decoded request path "${decoded}"`);
    return null;
  }

  for (const location of locations) {
    const resource = await lookup(location, decoded, context);

    if (!resource?.exists) {
      continue;
    }

    if (!checkResource(resource, location, resolver.allowedLocations)) {
      logger.warn(
        `Resolved ${resource.description} for "${decoded}" is outside ` +
          `${describeLocation(location)} or every allowed location`,
      );
      continue;
    }

    if (!resource.readable) {
      logger.debug(`${resource.description} is not readable`);
      continue;
    }

    return resource;
  }

  return null;
};

/** Asks each resolver in turn; the first resource found wins. */
export const resolveResource = async (
  resolvers: readonly ResourceResolver[],
  requestPath: string,
  locations: readonly Location[],
  context: ResolveContext,
): Promise<Resource | null> => {
  for (const resolver of resolvers) {
    let resource: Resource | null = null;

    switch (resolver.kind) {
      case 'path':
        resource = await resolveWithPathResolver(
          resolver,
          requestPath,
          locations,
          context,
        );
        break;
    }

    if (resource) {
      return resource;
    }
  }

  return null;
};
