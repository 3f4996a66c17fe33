import { describe, it, expect } from 'vitest';
import { parseListLine } from '../../src/utils/ftp-list.js';

describe('parseListLine', () => {
  it('should parse a directory entry', () => {
    expect(parseListLine('drwxr-xr-x 2 user group 4096 Jan 1 00:00 subdir')).toEqual({
      isDirectory: true,
      name: 'subdir',
    });
  });

  it('should parse a file entry', () => {
    expect(parseListLine('-rw-r--r-- 1 user group 12 Mar 14 09:30 notes.txt')).toEqual({
      isDirectory: false,
      name: 'notes.txt',
    });
  });

  it('should keep spaces in names, collapsed to one', () => {
    expect(parseListLine('-rw-r--r-- 1 user group 12 Mar 14 09:30 annual   report.pdf').name).toBe(
      'annual report.pdf'
    );
  });

  it('should tolerate padded columns', () => {
    expect(parseListLine('-rw-r--r-- 1 user group       13 Jan  1 00:00 a.txt').name).toBe('a.txt');
  });

  it('should fall back to the last token for short lines', () => {
    expect(parseListLine('d short dir')).toEqual({ isDirectory: true, name: 'dir' });
  });

  it('should return an empty name for an empty line', () => {
    expect(parseListLine('')).toEqual({ isDirectory: false, name: '' });
  });
});
