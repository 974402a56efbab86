import { cleanDomain, contentHash, extractDomainsFromText, isValidDomain, toIdna } from '../lib/domain';
import { IdnaEncodingError } from '../lib/errors';

describe('cleanDomain', () => {
  test('lowercases and strips surrounding whitespace, dots, commas and @', () => {
    expect(cleanDomain(' .Foo.COM,@ ')).toBe('foo.com');
    expect(cleanDomain('@mailinator.com')).toBe('mailinator.com');
  });

  test('leaves inner characters alone', () => {
    expect(cleanDomain('a..com')).toBe('a..com');
  });
});

describe('isValidDomain', () => {
  test('accepts registrable domains under a listed suffix', () => {
    expect(isValidDomain('foo.com')).toBe(true);
    expect(isValidDomain('mail-1.example.co.uk')).toBe(true);
    expect(isValidDomain('example.co.uk')).toBe(true);
    expect(isValidDomain('FOO.com.')).toBe(true);
  });

  test('rejects bare public suffixes', () => {
    expect(isValidDomain('com')).toBe(false);
    expect(isValidDomain('co.uk')).toBe(false);
  });

  test('rejects malformed hostnames', () => {
    expect(isValidDomain('a..com')).toBe(false);
    expect(isValidDomain('foo.c')).toBe(false);
    expect(isValidDomain('foo.com1')).toBe(false);
    expect(isValidDomain('foo_bar.com')).toBe(false);
    expect(isValidDomain(`${'a'.repeat(64)}.com`)).toBe(false);
  });

  test('rejects suffixes missing from the public suffix list', () => {
    expect(isValidDomain('foo.notarealtld')).toBe(false);
  });

  test('never throws', () => {
    for (const input of ['', ' ', '.', '@', '\u0000', '..', 'a'.repeat(1000), '-.com', '[]', '%%%.com']) {
      expect(() => isValidDomain(input)).not.toThrow();
      expect(isValidDomain(input)).toBe(false);
    }
  });
});

describe('toIdna', () => {
  test('encodes unicode labels', () => {
    expect(toIdna('bücher.de')).toBe('xn--bcher-kva.de');
    expect(toIdna('example.com')).toBe('example.com');
  });

  test('throws IdnaEncodingError for unencodable names', () => {
    expect(() => toIdna('a..com')).toThrow(IdnaEncodingError);
    expect(() => toIdna(`${'a'.repeat(64)}.com`)).toThrow(IdnaEncodingError);
    expect(() => toIdna('')).toThrow(IdnaEncodingError);
  });
});

describe('contentHash', () => {
  test('is the SHA1 hex digest of the ASCII form', () => {
    expect(contentHash('example.com')).toBe('0caaf24ab1a0c33440c06afe99df986365b0781f');
    expect(contentHash('bücher.de')).toBe('49afad6075d4c69b218ef2eaa7fff8a1fb7e6e4c');
  });
});

describe('extractDomainsFromText', () => {
  test('finds quoted and bracketed domains', () => {
    const text = '<b>"mailinator.com"</b> (trashmail.de) junk@notadomain';
    expect(extractDomainsFromText(text)).toEqual(['mailinator.com', 'trashmail.de']);
  });

  test('drops tokens that fail validation and duplicates', () => {
    expect(extractDomainsFromText('"co.uk" "x.com" \'X.com\'')).toEqual(['x.com']);
  });

  test('returns nothing for empty input', () => {
    expect(extractDomainsFromText('')).toEqual([]);
  });
});
