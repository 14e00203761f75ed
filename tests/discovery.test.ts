import { mkdirSync, mkdtempSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, expect, test } from 'vitest';
import { discover, orderFiles, parsePrefix } from '../src/core/pipeline/discovery.js';
import { createDirectoryReader } from '../src/core/pipeline/directory-reader.js';
import { ValidationError } from '../src/errors.js';
import { fakeReader } from './helpers.js';

describe('parsePrefix', () => {
  test('reads the integer before the first hyphen', () => {
    expect(parsePrefix('1-fetch.sh')).toBe(1n);
    expect(parsePrefix('010-model.py')).toBe(10n);
    expect(parsePrefix('3-build-tables.hql')).toBe(3n);
    expect(parsePrefix('12-')).toBe(12n);
  });

  test('accepts a plus sign and surrounding whitespace', () => {
    expect(parsePrefix('+4-load.sh')).toBe(4n);
    expect(parsePrefix(' 7 -trim.py')).toBe(7n);
  });

  test('rejects names without a hyphen or an integer head', () => {
    expect(parsePrefix('README.md')).toBeUndefined();
    expect(parsePrefix('a-notes.txt')).toBeUndefined();
    expect(parsePrefix('-1-negative.sh')).toBeUndefined();
    expect(parsePrefix('1.5-half.py')).toBeUndefined();
    expect(parsePrefix('1a-mixed.sh')).toBeUndefined();
    expect(parsePrefix('')).toBeUndefined();
  });
});

describe('orderFiles', () => {
  test('orders numerically rather than lexicographically', () => {
    const ordered = orderFiles(['10-a.sh', '2-b.py', '1-c.py']);
    expect(ordered.map((file) => file.name)).toEqual(['1-c.py', '2-b.py', '10-a.sh']);
    expect(ordered.map((file) => file.order)).toEqual([1n, 2n, 10n]);
  });

  test('drops ineligible names and keeps the full name of eligible ones', () => {
    const ordered = orderFiles([
      '5-visualize_present.R',
      'myproject.py',
      '1-transfer_data.sh',
      'random.txt',
      'image.jpeg',
      'x-1.sh',
    ]);
    expect(ordered).toEqual([
      { order: 1n, name: '1-transfer_data.sh' },
      { order: 5n, name: '5-visualize_present.R' },
    ]);
  });

  test('rejects prefixes that parse to the same integer', () => {
    expect(() => orderFiles(['2-b.py', '02-c.sh'])).toThrow(ValidationError);
    try {
      orderFiles(['1-a.sh', '2-b.py', '02-c.sh']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.duplicates).toEqual({ 2: ['02-c.sh', '2-b.py'] });
        expect(error.message).toBe('One or more files have the same integer prefix (2: 02-c.sh, 2-b.py)');
        expect(error.code).toBe('VALIDATION_ERROR');
      }
    }
  });

  test('keeps prefixes past 2^53 distinct and ordered', () => {
    const ordered = orderFiles(['9007199254740993-a.sh', '9007199254740992-b.sh', '3-c.py']);
    expect(ordered).toEqual([
      { order: 3n, name: '3-c.py' },
      { order: 9007199254740992n, name: '9007199254740992-b.sh' },
      { order: 9007199254740993n, name: '9007199254740993-a.sh' },
    ]);
  });

  test('reports a collision between long prefixes exactly', () => {
    expect(() => orderFiles(['123456789012345678901-a.sh', '0123456789012345678901-b.py'])).toThrow(
      'One or more files have the same integer prefix (123456789012345678901: 0123456789012345678901-b.py, 123456789012345678901-a.sh)',
    );
  });

  test('gives the same order for any listing order', () => {
    const names = ['3-c.sh', 'notes.md', '1-a.py', '20-z.R', '2-b.hql'];
    const expected = orderFiles(names);
    expect(orderFiles([...names].reverse())).toEqual(expected);
    expect(orderFiles([names[2], names[0], names[4], names[1], names[3]])).toEqual(expected);
  });

  test('returns frozen entries', () => {
    const [first] = orderFiles(['1-a.sh']);
    expect(Object.isFrozen(first)).toBe(true);
  });

  test('an empty listing yields no steps', () => {
    expect(orderFiles([])).toEqual([]);
  });
});

describe('discover', () => {
  test('lists the directory once through the reader', async () => {
    const reader = fakeReader(['2-b.py', '1-a.sh', 'notes.txt']);
    const files = await discover('/pipeline/', reader);
    expect(reader.calls).toEqual(['/pipeline/']);
    expect(files.map((file) => file.name)).toEqual(['1-a.sh', '2-b.py']);
  });

  test('fails the whole discovery on duplicate prefixes', async () => {
    await expect(discover('/pipeline/', fakeReader(['2-b.py', '02-c.sh', '1-a.sh']))).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  test('reads files from disk without descending into subdirectories', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'prefixrun-discover-'));
    writeFileSync(join(dir, '1-fetch.sh'), 'echo fetch\n');
    writeFileSync(join(dir, '2-build.py'), 'print("build")\n');
    writeFileSync(join(dir, 'README.md'), '# pipeline\n');
    mkdirSync(join(dir, '3-data'));
    writeFileSync(join(dir, '3-data', '4-nested.sh'), 'echo nested\n');
    symlinkSync(join(dir, '1-fetch.sh'), join(dir, '5-again.sh'));
    symlinkSync(join(dir, 'missing.sh'), join(dir, '6-dangling.sh'));

    const files = await discover(dir, createDirectoryReader());
    expect(files.map((file) => file.name)).toEqual(['1-fetch.sh', '2-build.py', '5-again.sh']);
  });
});
