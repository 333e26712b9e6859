import { describe, expect, it } from 'vitest';
import {
  decodePath,
  isInvalidPath,
  processPath,
} from '../source/handler/path.js';

describe('processPath', () => {
  it('returns canonical paths unchanged', () => {
    expect(processPath('/foo/bar')).toBe('/foo/bar');
    expect(processPath('foo/bar')).toBe('foo/bar');
  });

  it('strips leading whitespace and control characters', () => {
    expect(processPath('  /foo/bar')).toBe('/foo/bar');
    expect(processPath(`${String.fromCharCode(1)}/foo/bar`)).toBe('/foo/bar');
    expect(processPath(`${String.fromCharCode(31)}/foo/bar`)).toBe('/foo/bar');
    expect(processPath('  foo/bar')).toBe('foo/bar');
    expect(processPath(`${String.fromCharCode(31)}foo/bar`)).toBe('foo/bar');
  });

  it('strips a leading DEL character', () => {
    expect(processPath(`${String.fromCharCode(127)}/foo/bar`)).toBe(
      '/foo/bar',
    );
  });

  it('collapses interleaved slashes and control characters', () => {
    expect(processPath('  /  foo/bar')).toBe('/foo/bar');
    expect(processPath('  /  /  foo/bar')).toBe('/foo/bar');
    expect(processPath('  // /// ////  foo/bar')).toBe('/foo/bar');
    expect(
      processPath(
        `${String.fromCharCode(1)} / ${String.fromCharCode(127)} // foo/bar`,
      ),
    ).toBe('/foo/bar');
  });

  it('reduces root and empty paths', () => {
    expect(processPath('   ')).toBe('');
    expect(processPath('')).toBe('');
    expect(processPath('/')).toBe('/');
    expect(processPath('///')).toBe('/');
    expect(processPath('/ /   / ')).toBe('/');
  });

  it('collapses a doubled leading slash', () => {
    expect(processPath('//foo')).toBe('/foo');
  });

  it('leaves separators after the first path character alone', () => {
    expect(processPath('  foo//bar ')).toBe('foo//bar ');
  });
});

describe('isInvalidPath', () => {
  it('accepts ordinary paths', () => {
    expect(isInvalidPath('foo.css')).toBe(false);
    expect(isInvalidPath('/js/foo.js')).toBe(false);
    expect(isInvalidPath('a..b/c')).toBe(false);
  });

  it('rejects parent segments with either separator', () => {
    expect(isInvalidPath('../testsecret/secret.txt')).toBe(true);
    expect(isInvalidPath('test/../../testsecret/secret.txt')).toBe(true);
    expect(isInvalidPath('////../../etc/passwd')).toBe(true);
    expect(isInvalidPath('js\\..\\..\\secret.txt')).toBe(true);
  });

  it('rejects scheme and drive prefixes', () => {
    expect(isInvalidPath('file:/etc/passwd')).toBe(true);
    expect(isInvalidPath('/file:/etc/passwd')).toBe(true);
    expect(isInvalidPath('url:/etc/passwd')).toBe(true);
    expect(isInvalidPath('/url:/etc/passwd')).toBe(true);
    expect(isInvalidPath('C:/Windows/win.ini')).toBe(true);
  });

  it('rejects NUL bytes', () => {
    expect(isInvalidPath('foo.css\0.txt')).toBe(true);
  });
});

describe('decodePath', () => {
  it('returns paths without escapes as they are', () => {
    expect(decodePath('foo bar.txt')).toBe('foo bar.txt');
  });

  it('decodes escape sequences', () => {
    expect(decodePath('/%2E%2E/testsecret')).toBe('/../testsecret');
    expect(decodePath('foo%20bar.txt')).toBe('foo bar.txt');
  });

  it('returns null for malformed escapes', () => {
    expect(decodePath('/%foo%/bar.txt')).toBeNull();
  });
});
