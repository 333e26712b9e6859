// source/handler/resources.ts
// Locations and the resources created relative to them.

import { once } from 'node:events';
import { createReadStream, lstat, realpath, stat } from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import { promisify } from 'node:util';
import isPathInside from 'path-is-inside';
import { findEntry, normalizeEntryName } from './archive.js';
import { ResourceNotFoundError, isMissingEntry } from './errors.js';
import type { Stats } from 'node:fs';
import type { Archive } from './archive.js';

const lstatAsync = promisify(lstat);
const statAsync = promisify(stat);
const realpathAsync = promisify(realpath);

export interface DirectoryLocation {
  readonly kind: 'directory';
  readonly root: string;
}

export interface ArchiveLocation {
  readonly kind: 'archive';
  readonly archive: Archive;
  /** Folder inside the archive, `''` or ending with `/`. */
  readonly prefix: string;
}

export type Location = DirectoryLocation | ArchiveLocation;

/** Inclusive byte window. */
export interface ByteWindow {
  start: number;
  end: number;
}

export interface ByteSource {
  readonly stream: Readable;
  close: () => void | Promise<void>;
}

export type CanonicalPath =
  | { readonly kind: 'file'; readonly path: string }
  | {
      readonly kind: 'archive';
      readonly archive: Archive;
      readonly name: string;
    };

export interface Resource {
  /** Base name, used for media type lookup. */
  readonly name: string;
  readonly description: string;
  readonly exists: boolean;
  /** Filesystem directories are never readable, archive folders are. */
  readonly readable: boolean;
  readonly length: number;
  readonly lastModified: number | undefined;
  readonly canonical: CanonicalPath;
  open: (window?: ByteWindow) => Promise<ByteSource>;
}

export interface FileSystemHandlers {
  lstat: (path: string) => Promise<Stats>;
  stat: (path: string) => Promise<Stats>;
  realpath: (path: string) => Promise<string>;
  createReadStream: (
    path: string,
    options?: { start?: number; end?: number },
  ) => Readable;
}

export const getHandlers = (): FileSystemHandlers => ({
  lstat: (filePath: string) => lstatAsync(filePath),
  stat: (filePath: string) => statAsync(filePath),
  realpath: (filePath: string) => realpathAsync(filePath),
  createReadStream,
});

export const directoryLocation = (root: string): DirectoryLocation => ({
  kind: 'directory',
  root: path.resolve(root),
});

export const archiveLocation = (
  archive: Archive,
  prefix = '',
): ArchiveLocation => {
  const normalized = normalizeEntryName(prefix);
  return {
    kind: 'archive',
    archive,
    prefix:
      normalized === '' || normalized.endsWith('/')
        ? normalized
        : `${normalized}/`,
  };
};

export const describeLocation = (location: Location): string =>
  location.kind === 'directory'
    ? `directory [${location.root}]`
    : `archive [${location.archive.name}!/${location.prefix}]`;

export const isUnderLocation = (
  resource: Resource,
  location: Location,
): boolean => {
  const { canonical } = resource;

  switch (location.kind) {
    case 'directory':
      return (
        canonical.kind === 'file' &&
        isPathInside(canonical.path, location.root)
      );
    case 'archive':
      return (
        canonical.kind === 'archive' &&
        canonical.archive === location.archive &&
        canonical.name.startsWith(location.prefix)
      );
  }
};

const openFile = async (
  handlers: FileSystemHandlers,
  filePath: string,
  window?: ByteWindow,
): Promise<ByteSource> => {
  const stream = handlers.createReadStream(
    filePath,
    window ? { start: window.start, end: window.end } : undefined,
  );

  try {
    await once(stream, 'open');
  } catch (err: unknown) {
    stream.destroy();
    throw new ResourceNotFoundError(filePath, { cause: err });
  }

  return {
    stream,
    close: () => {
      stream.destroy();
    },
  };
};

const statOrNull = async (
  statFn: (filePath: string) => Promise<Stats>,
  filePath: string,
): Promise<Stats | null> => {
  try {
    return await statFn(filePath);
  } catch (err: unknown) {
    if (isMissingEntry(err)) return null;
    throw err;
  }
};

const createFileResource = async (
  location: DirectoryLocation,
  relativePath: string,
  handlers: FileSystemHandlers,
  symlinks: boolean,
): Promise<Resource | null> => {
  const absolutePath = path.join(location.root, relativePath);
  let stats = await statOrNull(handlers.lstat, absolutePath);

  if (stats?.isSymbolicLink()) {
    stats = symlinks ? await statOrNull(handlers.stat, absolutePath) : null;
  }

  if (!stats) {
    return null;
  }

  let canonicalPath: string;

  try {
    canonicalPath = await handlers.realpath(absolutePath);
  } catch (err: unknown) {
    if (isMissingEntry(err)) return null;
    throw err;
  }

  const file = stats.isFile();

  return {
    name: path.basename(absolutePath),
    description: `file [${absolutePath}]`,
    exists: true,
    readable: file,
    length: file ? stats.size : 0,
    lastModified: stats.mtime.getTime(),
    canonical: { kind: 'file', path: canonicalPath },
    open: (window?: ByteWindow) => openFile(handlers, canonicalPath, window),
  };
};

const createArchiveResource = (
  location: ArchiveLocation,
  relativePath: string,
): Resource | null => {
  const { archive } = location;
  const entry = findEntry(
    archive,
    path.posix.join(location.prefix, relativePath),
  );

  if (!entry) {
    return null;
  }

  const open = (window?: ByteWindow): Promise<ByteSource> => {
    const chunk = window
      ? entry.data.subarray(window.start, window.end + 1)
      : entry.data;
    const stream = Readable.from(chunk.length > 0 ? [chunk] : [], {
      objectMode: false,
    });

    return Promise.resolve({
      stream,
      close: () => {
        stream.destroy();
      },
    });
  };

  return {
    name: path.posix.basename(entry.name),
    description: `archive entry [${archive.name}!/${entry.name}]`,
    exists: true,
    readable: true,
    length: entry.data.length,
    lastModified: entry.lastModified,
    canonical: { kind: 'archive', archive, name: entry.name },
    open,
  };
};

/**
 * Creates the resource a relative path points at inside a location, or
 * `null` when nothing exists there.
 */
export const createRelative = async (
  location: Location,
  relativePath: string,
  handlers: FileSystemHandlers,
  symlinks: boolean,
): Promise<Resource | null> => {
  switch (location.kind) {
    case 'directory':
      return createFileResource(location, relativePath, handlers, symlinks);
    case 'archive':
      return createArchiveResource(location, relativePath);
  }
};
