import { describe, expect, it } from 'vitest';
import { isValidUrl, parseIndexList, sanitizeFilename, splitArgs } from './validator.js';

describe('isValidUrl', () => {
    it('accepts http and https only', () => {
        expect(isValidUrl('https://example.com/watch?v=abc')).toBe(true);
        expect(isValidUrl('http://example.com')).toBe(true);
        expect(isValidUrl('ftp://example.com')).toBe(false);
        expect(isValidUrl('example.com')).toBe(false);
    });
});

describe('sanitizeFilename', () => {
    it('removes separators and template characters', () => {
        expect(sanitizeFilename('a/b\\c: "d"  %e')).toBe('abc d e');
    });
});

describe('splitArgs', () => {
    it('splits on whitespace and honours quotes', () => {
        expect(splitArgs(`--embed-thumbnail  -o "%(title)s.%(ext)s" --match-title 'a b'`)).toEqual([
            '--embed-thumbnail',
            '-o',
            '%(title)s.%(ext)s',
            '--match-title',
            'a b',
        ]);
    });

    it('keeps empty quoted arguments and escaped spaces', () => {
        expect(splitArgs(`--referer "" a\\ b`)).toEqual(['--referer', '', 'a b']);
        expect(splitArgs('   ')).toEqual([]);
    });

    it('throws on an unterminated quote', () => {
        expect(() => splitArgs('--foo "bar')).toThrow('Unterminated " quote');
    });
});

describe('parseIndexList', () => {
    it('expands ranges and removes duplicates', () => {
        expect(parseIndexList('5-7, 1,3,6')).toEqual([1, 3, 5, 6, 7]);
    });

    it('rejects zero, reversed ranges and junk', () => {
        expect(() => parseIndexList('0')).toThrow('Invalid index: 0');
        expect(() => parseIndexList('4-2')).toThrow('Invalid index range: 4-2');
        expect(() => parseIndexList('x')).toThrow('Invalid index: x');
    });
});
