import { describe, expect, it } from 'vitest';
import {
  archiveFromAssets,
  createArchive,
  findEntry,
  normalizeEntryName,
} from '../source/handler/archive.js';

describe('normalizeEntryName', () => {
  it('drops leading slashes and dot segments', () => {
    expect(normalizeEntryName('/a/./b.js')).toBe('a/b.js');
    expect(normalizeEntryName('a//b/')).toBe('a/b/');
    expect(normalizeEntryName('/')).toBe('');
  });
});

describe('createArchive', () => {
  const archive = createArchive(
    'webjars.jar',
    [
      { name: 'META-INF/resources/webjars/underscorejs/underscore.js', data: '_' },
      { name: 'empty/', data: '' },
    ],
    Date.UTC(2026, 0, 1),
  );

  it('records every parent folder as a directory entry', () => {
    expect([...archive.entries.keys()].sort()).toEqual([
      'META-INF/',
      'META-INF/resources/',
      'META-INF/resources/webjars/',
      'META-INF/resources/webjars/underscorejs/',
      'META-INF/resources/webjars/underscorejs/underscore.js',
      'empty/',
    ]);
  });

  it('stores zero-length directory entries', () => {
    const entry = findEntry(archive, 'META-INF/resources/webjars/underscorejs/');

    expect(entry?.directory).toBe(true);
    expect(entry?.data.length).toBe(0);
    expect(entry?.lastModified).toBe(Date.UTC(2026, 0, 1));
  });

  it('finds a directory named without its trailing slash', () => {
    expect(findEntry(archive, 'empty')?.name).toBe('empty/');
  });

  it('finds nothing for unknown names', () => {
    expect(findEntry(archive, 'missing.js')).toBeUndefined();
    expect(findEntry(archive, '')).toBeUndefined();
  });
});

describe('archiveFromAssets', () => {
  it('decodes base64 asset content', () => {
    const archive = archiveFromAssets('assets', {
      'index.html': Buffer.from('<p>hi</p>').toString('base64'),
    });

    expect(findEntry(archive, '/index.html')?.data.toString()).toBe(
      '<p>hi</p>',
    );
  });
});
