import type { LoggerMethods } from '@ocrflow/logger';
import type {
  DocumentSource,
  FileRef,
  ProcessingOptions,
  UrlRef,
  WorkItem,
} from '@ocrflow/model';
import type { Stats } from 'node:fs';

import { Logger } from '@ocrflow/logger';
import { DEFAULT_PROCESSING_OPTIONS } from '@ocrflow/model';
import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join, resolve as resolvePath } from 'node:path';

import type { ResolverConfig } from '../config/engine-config';

import { OCR_ENGINE, isSupportedExtension, isUrl } from '../config/constants';
import { InvalidInputError, UnsupportedFileTypeError } from '../errors';

export interface DocumentResolverOptions extends Partial<ResolverConfig> {
  logger?: LoggerMethods;
  /** Processing options copied into every WorkItem unless a descriptor overrides them */
  defaultOptions?: Partial<ProcessingOptions>;
}

/**
 * One entry of a multi-input batch: a path or URL with optional per-descriptor options.
 */
export type InputDescriptor =
  | string
  | { input: string; options?: Partial<ProcessingOptions> };

/**
 * DocumentResolver
 *
 * Turns input descriptors (file path, directory path or URL) into an ordered
 * list of WorkItems.
 *
 * - A file must have a supported extension.
 * - A directory contributes its supported files, sorted by name; other files are skipped.
 * - A URL becomes a single item and is not fetched.
 *
 * Ids are assigned in final order (item-001, item-002, ...).
 */
export class DocumentResolver {
  private readonly logger: LoggerMethods;
  private readonly recursive: boolean;
  private readonly allowEmpty: boolean;
  private readonly caseCollision: ResolverConfig['caseCollision'];
  private readonly defaultOptions: ProcessingOptions;

  constructor(options: DocumentResolverOptions = {}) {
    this.logger = options.logger ?? Logger.silent();
    this.recursive = options.recursive ?? false;
    this.allowEmpty = options.allowEmpty ?? false;
    this.caseCollision = options.caseCollision ?? 'allow';
    this.defaultOptions = {
      ...DEFAULT_PROCESSING_OPTIONS,
      ...options.defaultOptions,
    };
  }

  /**
   * Resolve a single descriptor.
   *
   * @throws InvalidInputError when the path does not exist, the URL is malformed,
   *   or nothing processable is found (unless allowEmpty)
   * @throws UnsupportedFileTypeError when a single file has an unsupported extension
   */
  async resolve(
    input: string,
    options?: Partial<ProcessingOptions>,
  ): Promise<WorkItem[]> {
    return this.resolveAll([{ input, options }]);
  }

  /**
   * Resolve several descriptors into one batch. Items keep descriptor order,
   * and ids are numbered across the whole list.
   */
  async resolveAll(descriptors: InputDescriptor[]): Promise<WorkItem[]> {
    const entries: Array<{
      source: DocumentSource;
      options: ProcessingOptions;
    }> = [];

    for (const descriptor of descriptors) {
      const { input, options } =
        typeof descriptor === 'string' ? { input: descriptor } : descriptor;
      const merged = { ...this.defaultOptions, ...options };

      for (const source of await this.resolveSources(input)) {
        entries.push({ source, options: merged });
      }
    }

    if (entries.length === 0 && !this.allowEmpty) {
      throw new InvalidInputError(
        'No processable documents found in the given input',
        descriptors
          .map((d) => (typeof d === 'string' ? d : d.input))
          .join(', '),
      );
    }

    const items = entries.map(({ source, options }, index) =>
      Object.freeze({
        id: formatItemId(index + 1),
        source: Object.freeze(source),
        options: Object.freeze({ ...options }),
      }),
    );

    this.logger.info(
      `[DocumentResolver] Resolved ${items.length} document(s) from ${descriptors.length} input(s)`,
    );

    return items;
  }

  private async resolveSources(input: string): Promise<DocumentSource[]> {
    if (isUrl(input)) {
      return [this.toUrlRef(input)];
    }

    const fullPath = resolvePath(input);
    const info = await statOrUndefined(fullPath);

    if (!info) {
      throw new InvalidInputError(
        `Invalid input path: ${input}. Must be a file, directory, or URL.`,
        input,
      );
    }

    if (info.isDirectory()) {
      const files = await this.scanDirectory(fullPath);
      if (files.length === 0) {
        this.logger.warn(
          `[DocumentResolver] No supported files found in directory: ${input}`,
        );
      }
      return files;
    }

    if (!info.isFile()) {
      throw new InvalidInputError(
        `Invalid input path: ${input}. Must be a file, directory, or URL.`,
        input,
      );
    }

    const extension = extensionOf(fullPath);
    if (!isSupportedExtension(extension)) {
      throw new UnsupportedFileTypeError(fullPath);
    }

    return [toFileRef(fullPath, extension, info)];
  }

  private toUrlRef(input: string): UrlRef {
    let parsed: URL;
    try {
      parsed = new URL(input);
    } catch {
      throw new InvalidInputError(`Invalid URL: ${input}`, input);
    }

    if (!parsed.hostname) {
      throw new InvalidInputError(`Invalid URL: ${input}`, input);
    }

    const extension = extensionOf(parsed.pathname);
    return extension
      ? { kind: 'url', url: input, extension }
      : { kind: 'url', url: input };
  }

  /**
   * List supported files of a directory, sorted by name.
   * Subdirectories are visited only when `recursive` is set, depth first
   * at their place in the sorted listing.
   */
  private async scanDirectory(directory: string): Promise<FileRef[]> {
    const names = (await readdir(directory)).sort();
    const files: FileRef[] = [];
    const ownFiles: FileRef[] = [];

    for (const name of names) {
      const fullPath = join(directory, name);
      const info = await statOrUndefined(fullPath);
      if (!info) {
        continue;
      }

      if (info.isDirectory()) {
        if (this.recursive) {
          files.push(...(await this.scanDirectory(fullPath)));
        }
        continue;
      }

      const extension = extensionOf(name);
      if (!info.isFile() || !isSupportedExtension(extension)) {
        this.logger.debug(`[DocumentResolver] Skipping ${fullPath}`);
        continue;
      }

      const file = toFileRef(fullPath, extension, info);
      ownFiles.push(file);
      files.push(file);
    }

    this.checkCaseCollisions(directory, ownFiles);

    return files;
  }

  private checkCaseCollisions(directory: string, files: FileRef[]): void {
    const seen = new Map<string, string>();

    for (const file of files) {
      const key = file.name.toLowerCase();
      const previous = seen.get(key);

      if (previous !== undefined) {
        const message = `Files differ only by case: ${previous}, ${file.name}`;
        if (this.caseCollision === 'reject') {
          throw new InvalidInputError(message, directory);
        }
        this.logger.warn(`[DocumentResolver] ${message}`);
      } else {
        seen.set(key, file.name);
      }
    }
  }
}

export function formatItemId(position: number): string {
  const digits = String(position).padStart(OCR_ENGINE.ITEM_ID_MIN_DIGITS, '0');
  return `${OCR_ENGINE.ITEM_ID_PREFIX}${digits}`;
}

function extensionOf(path: string): string {
  return extname(path).slice(1).toLowerCase();
}

function toFileRef(path: string, extension: string, info: Stats): FileRef {
  return {
    kind: 'file',
    path,
    name: basename(path),
    extension,
    sizeBytes: info.size,
  };
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissingPathError(error)) {
      return undefined;
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
