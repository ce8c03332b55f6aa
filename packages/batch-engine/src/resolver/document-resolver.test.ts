import type { LoggerMethods } from '@ocrflow/logger';

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { InvalidInputError, UnsupportedFileTypeError } from '../errors';
import { DocumentResolver, formatItemId } from './document-resolver';

const makeLogger = (): LoggerMethods => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('DocumentResolver', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'ocrflow-resolver-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const touch = async (relativePath: string, content = 'x') => {
    await writeFile(join(root, relativePath), content);
  };

  describe('directories', () => {
    test('keeps supported files in name order and skips the rest', async () => {
      await touch('b.pdf');
      await touch('a.png');
      await touch('c.txt');

      const items = await new DocumentResolver().resolve(root);

      expect(items.map((item) => item.id)).toEqual(['item-001', 'item-002']);
      expect(
        items.map((item) =>
          item.source.kind === 'file' ? item.source.name : item.source.url,
        ),
      ).toEqual(['a.png', 'b.pdf']);
    });

    test('orders by code unit, so upper case sorts first', async () => {
      await touch('b.pdf');
      await touch('B.PDF');
      await touch('a.jpg');

      const items = await new DocumentResolver().resolve(root);

      expect(
        items.map((item) =>
          item.source.kind === 'file' ? item.source.name : '',
        ),
      ).toEqual(['B.PDF', 'a.jpg', 'b.pdf']);
    });

    test('returns the same order on repeated calls', async () => {
      await touch('z.tif');
      await touch('m.bmp');
      await touch('a.jpeg');
      const resolver = new DocumentResolver();

      const first = await resolver.resolve(root);
      const second = await resolver.resolve(root);

      expect(second).toEqual(first);
    });

    test('fills in file details', async () => {
      await touch('scan.PDF', 'hello');

      const [item] = await new DocumentResolver().resolve(root);

      expect(item.source).toEqual({
        kind: 'file',
        path: join(root, 'scan.PDF'),
        name: 'scan.PDF',
        extension: 'pdf',
        sizeBytes: 5,
      });
    });

    test('does not enter subdirectories by default', async () => {
      await touch('a.pdf');
      await mkdir(join(root, 'nested'));
      await touch('nested/b.pdf');

      const items = await new DocumentResolver().resolve(root);

      expect(items).toHaveLength(1);
    });

    test('visits subdirectories depth first when recursive', async () => {
      await touch('a.pdf');
      await mkdir(join(root, 'b'));
      await touch('b/inner.png');
      await touch('c.pdf');

      const items = await new DocumentResolver({ recursive: true }).resolve(
        root,
      );

      expect(
        items.map((item) =>
          item.source.kind === 'file' ? item.source.path : '',
        ),
      ).toEqual([
        join(root, 'a.pdf'),
        join(root, 'b', 'inner.png'),
        join(root, 'c.pdf'),
      ]);
      expect(items.map((item) => item.id)).toEqual([
        'item-001',
        'item-002',
        'item-003',
      ]);
    });

    test('fails on a directory without supported files', async () => {
      await touch('notes.txt');

      await expect(new DocumentResolver().resolve(root)).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });

    test('returns an empty list when allowEmpty is set', async () => {
      const logger = makeLogger();

      const items = await new DocumentResolver({
        allowEmpty: true,
        logger,
      }).resolve(root);

      expect(items).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        `[DocumentResolver] No supported files found in directory: ${root}`,
      );
    });

    test('warns about case collisions by default', async () => {
      await touch('Scan.pdf');
      await touch('scan.pdf');
      const logger = makeLogger();

      const items = await new DocumentResolver({ logger }).resolve(root);

      expect(items).toHaveLength(2);
      expect(logger.warn).toHaveBeenCalledWith(
        '[DocumentResolver] Files differ only by case: Scan.pdf, scan.pdf',
      );
    });

    test('rejects case collisions when configured', async () => {
      await touch('Scan.pdf');
      await touch('scan.pdf');

      await expect(
        new DocumentResolver({ caseCollision: 'reject' }).resolve(root),
      ).rejects.toThrow('Files differ only by case: Scan.pdf, scan.pdf');
    });
  });

  describe('single files', () => {
    test('resolves a supported file', async () => {
      await touch('page.jpg');

      const items = await new DocumentResolver().resolve(join(root, 'page.jpg'));

      expect(items).toHaveLength(1);
      expect(items[0].id).toBe('item-001');
      expect(items[0].options).toEqual({ includeImages: false });
    });

    test('rejects an unsupported extension', async () => {
      await touch('notes.txt');
      const filePath = join(root, 'notes.txt');

      const error = await new DocumentResolver()
        .resolve(filePath)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedFileTypeError);
      expect(error).toMatchObject({
        kind: 'UnsupportedFileType',
        message: `Unsupported file type: ${filePath}`,
      });
    });

    test('rejects a path that does not exist', async () => {
      const missing = join(root, 'missing.pdf');

      await expect(new DocumentResolver().resolve(missing)).rejects.toThrow(
        `Invalid input path: ${missing}. Must be a file, directory, or URL.`,
      );
    });
  });

  describe('urls', () => {
    test('creates one item without fetching', async () => {
      const items = await new DocumentResolver().resolve(
        'https://example.com/files/report.PDF',
      );

      expect(items).toEqual([
        {
          id: 'item-001',
          source: {
            kind: 'url',
            url: 'https://example.com/files/report.PDF',
            extension: 'pdf',
          },
          options: { includeImages: false },
        },
      ]);
    });

    test('omits the extension when the path has none', async () => {
      const [item] = await new DocumentResolver().resolve(
        'https://example.com/download',
      );

      expect(item.source).toEqual({
        kind: 'url',
        url: 'https://example.com/download',
      });
    });

    test('rejects a malformed url', async () => {
      await expect(
        new DocumentResolver().resolve('http://'),
      ).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe('resolveAll', () => {
    test('numbers ids across descriptors and applies per-descriptor options', async () => {
      await touch('a.pdf');
      await touch('b.png');

      const items = await new DocumentResolver({
        defaultOptions: { model: 'ocr-model' },
      }).resolveAll([
        'https://example.com/one.pdf',
        { input: root, options: { includeImages: true } },
      ]);

      expect(items.map((item) => item.id)).toEqual([
        'item-001',
        'item-002',
        'item-003',
      ]);
      expect(items[0].options).toEqual({
        includeImages: false,
        model: 'ocr-model',
      });
      expect(items[2].options).toEqual({
        includeImages: true,
        model: 'ocr-model',
      });
    });

    test('freezes the produced items', async () => {
      const [item] = await new DocumentResolver().resolveAll([
        'https://example.com/a.png',
      ]);

      expect(Object.isFrozen(item)).toBe(true);
      expect(Object.isFrozen(item.source)).toBe(true);
      expect(Object.isFrozen(item.options)).toBe(true);
    });
  });
});

describe('formatItemId', () => {
  test('pads to three digits and grows past them', () => {
    expect(formatItemId(1)).toBe('item-001');
    expect(formatItemId(42)).toBe('item-042');
    expect(formatItemId(1234)).toBe('item-1234');
  });
});
