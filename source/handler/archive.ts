// source/handler/archive.ts
// Immutable in-memory archive of packaged assets (a bundle, jar or zip image).

import path from 'node:path';

export interface ArchiveEntry {
  /** Normalized entry name; directory entries end with `/`. */
  readonly name: string;
  readonly directory: boolean;
  readonly data: Buffer;
  readonly lastModified: number;
}

export interface Archive {
  readonly name: string;
  readonly entries: ReadonlyMap<string, ArchiveEntry>;
}

export interface ArchiveFile {
  name: string;
  data: Buffer | string;
  lastModified?: number;
}

/**
 * Turns any spelling of an entry name into the archive's canonical form:
 * no leading slash, `.` segments removed, single separators.
 */
export const normalizeEntryName = (name: string): string => {
  const trailing = name.endsWith('/');
  const normalized = path.posix
    .normalize(path.posix.join('/', name))
    .replace(/^\/+/, '');

  if (normalized === '' || normalized === '.') {
    return '';
  }

  return trailing && !normalized.endsWith('/') ? `${normalized}/` : normalized;
};

const parentsOf = (name: string): string[] => {
  const parts = name.split('/').filter(Boolean);
  const parents: string[] = [];

  for (let index = 1; index < parts.length; index++) {
    parents.push(`${parts.slice(0, index).join('/')}/`);
  }

  return parents;
};

/**
 * Packs files into an archive. Every parent folder is recorded as an
 * explicit zero-length directory entry, the way jar and zip tools do.
 */
export const createArchive = (
  name: string,
  files: readonly ArchiveFile[],
  lastModified: number = Date.now(),
): Archive => {
  const entries = new Map<string, ArchiveEntry>();

  const addDirectory = (directoryName: string): void => {
    if (!entries.has(directoryName)) {
      entries.set(
        directoryName,
        Object.freeze({
          name: directoryName,
          directory: true,
          data: Buffer.alloc(0),
          lastModified,
        }),
      );
    }
  };

  for (const file of files) {
    const entryName = normalizeEntryName(file.name);
    if (entryName === '') continue;

    for (const parent of parentsOf(entryName)) {
      addDirectory(parent);
    }

    if (entryName.endsWith('/')) {
      addDirectory(entryName);
      continue;
    }

    const data =
      typeof file.data === 'string' ? Buffer.from(file.data) : file.data;

    entries.set(
      entryName,
      Object.freeze({
        name: entryName,
        directory: false,
        data,
        lastModified: file.lastModified ?? lastModified,
      }),
    );
  }

  return Object.freeze({ name, entries });
};

/**
 * Builds an archive from a map of entry name to base64 content, the shape
 * build scripts use to embed web assets into a bundle.
 */
export const archiveFromAssets = (
  name: string,
  assets: Readonly<Record<string, string>>,
  lastModified?: number,
): Archive =>
  createArchive(
    name,
    Object.entries(assets).map(([entryName, base64]) => ({
      name: entryName,
      data: Buffer.from(base64, 'base64'),
    })),
    lastModified,
  );

/**
 * Looks an entry up the way a jar lookup does: an exact match first, then
 * the directory entry for a name given without its trailing slash.
 */
export const findEntry = (
  archive: Archive,
  name: string,
): ArchiveEntry | undefined => {
  const normalized = normalizeEntryName(name);
  if (normalized === '') return undefined;

  return (
    archive.entries.get(normalized) ??
    (normalized.endsWith('/')
      ? undefined
      : archive.entries.get(`${normalized}/`))
  );
};
