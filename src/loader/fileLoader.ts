/**
 * Translation File Loader
 *
 * Builds a CatalogueBag from a directory of `{domain}.{locale}.{ext}` files,
 * e.g. `messages.en.json`, `errors.fr-CA.json` or `app.menu.de_AT.json`.
 * The locale is the last dot segment before the extension; everything in front
 * of it is the domain. Files with other extensions and subdirectories are skipped.
 *
 * Each file holds a flat JSON object of message id to template.
 * Files are merged in name order, so the result does not depend on the order
 * the file system lists them in.
 *
 * @module loader/fileLoader
 */

import * as fs from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { Catalogue, CatalogueBag } from '../i18n/catalogue';
import { Locale } from '../i18n/locale';
import { CatalogueLoadError, ErrorCodes } from '../errors/TranslationError';
import { createLogger, createTimer, extractError } from '../utils/logger';

const log = createLogger('LOADER');

export const DEFAULT_EXTENSIONS: readonly string[] = ['json'];

const MessageFileSchema = z.record(z.string());

// Keys an object record cannot hold as own properties
const RESERVED_IDS: readonly string[] = ['__proto__'];

export interface LoaderOptions {
  /** Accepted extensions, without the dot. Defaults to json. */
  extensions?: readonly string[];
}

export interface TranslationFile {
  path: string;
  domain: string;
  locale: Locale;
}

/**
 * Locale tag -> domain -> file paths
 */
export type TranslationFileIndex = Map<string, Map<string, string[]>>;

function acceptedExtension(fileName: string, extensions: readonly string[]): string | undefined {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) return undefined;
  const extension = fileName.slice(dot + 1).toLowerCase();
  return extensions.includes(extension) ? extension : undefined;
}

/**
 * Split a file name into domain and locale.
 *
 * @returns undefined when the extension is not accepted
 * @throws CatalogueLoadError (INVALID_FILENAME) for an accepted file without a usable domain or locale
 */
export function parseFileName(
  fileName: string,
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): TranslationFile | undefined {
  const extension = acceptedExtension(fileName, extensions);
  if (extension === undefined) return undefined;

  const path = join(dir, fileName);
  const stem = fileName.slice(0, -(extension.length + 1));
  const separator = stem.lastIndexOf('.');
  if (separator <= 0 || separator === stem.length - 1) {
    throw new CatalogueLoadError(
      ErrorCodes.INVALID_FILENAME,
      `Translation file '${fileName}' must be named {domain}.{locale}.${extension}`,
      path
    );
  }

  const tag = stem.slice(separator + 1);
  const locale = Locale.tryFromTag(tag);
  if (!locale) {
    throw new CatalogueLoadError(
      ErrorCodes.INVALID_FILENAME,
      `Translation file '${fileName}' names unknown locale '${tag}'`,
      path,
      { tag }
    );
  }

  return { path, domain: stem.slice(0, separator), locale };
}

/**
 * Parse and validate the content of one translation file
 *
 * @throws CatalogueLoadError (INVALID_FILE_CONTENT)
 */
export function parseMessages(content: string, path: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new CatalogueLoadError(
      ErrorCodes.INVALID_FILE_CONTENT,
      `Translation file '${path}' is not valid JSON`,
      path,
      extractError(error)
    );
  }

  const result = MessageFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogueLoadError(
      ErrorCodes.INVALID_FILE_CONTENT,
      `Translation file '${path}' must be a flat object of string messages`,
      path,
      {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }
    );
  }

  const reserved = RESERVED_IDS.filter(
    (id) => typeof parsed === 'object' && parsed !== null && Object.hasOwn(parsed, id)
  );
  if (reserved.length > 0) {
    throw new CatalogueLoadError(
      ErrorCodes.INVALID_FILE_CONTENT,
      `Translation file '${path}' must be a flat object of string messages`,
      path,
      { issues: reserved.map((id) => ({ path: id, message: `'${id}' is a reserved message id` })) }
    );
  }
  return result.data;
}

function collectFiles(dir: string, entries: fs.Dirent[], extensions: readonly string[]): TranslationFile[] {
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .flatMap((name) => parseFileName(name, dir, extensions) ?? []);
}

function indexFiles(files: TranslationFile[]): TranslationFileIndex {
  const index: TranslationFileIndex = new Map();
  for (const file of files) {
    const tag = file.locale.toTag();
    let domains = index.get(tag);
    if (!domains) {
      domains = new Map();
      index.set(tag, domains);
    }
    const paths = domains.get(file.domain) ?? [];
    paths.push(file.path);
    domains.set(file.domain, paths);
  }
  return index;
}

function buildBag(files: TranslationFile[], contents: string[]): CatalogueBag {
  const bag = new CatalogueBag();
  files.forEach((file, i) => {
    const messages = parseMessages(contents[i], file.path);
    bag.insert(new Catalogue(file.locale, { [file.domain]: messages }));
    log.debug('Loaded translation file', {
      path: file.path,
      locale: file.locale.toTag(),
      domain: file.domain,
      messages: Object.keys(messages).length,
    });
  });
  return bag;
}

function directoryError(dir: string, error: unknown): CatalogueLoadError {
  return new CatalogueLoadError(
    ErrorCodes.DIRECTORY_UNREADABLE,
    `Translation directory '${dir}' could not be read`,
    dir,
    extractError(error)
  );
}

function fileError(path: string, error: unknown): CatalogueLoadError {
  return new CatalogueLoadError(
    ErrorCodes.FILE_UNREADABLE,
    `Translation file '${path}' could not be read`,
    path,
    extractError(error)
  );
}

async function readTranslationFiles(dir: string, extensions: readonly string[]): Promise<TranslationFile[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw directoryError(dir, error);
  }
  return collectFiles(dir, entries, extensions);
}

function readTranslationFilesSync(dir: string, extensions: readonly string[]): TranslationFile[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw directoryError(dir, error);
  }
  return collectFiles(dir, entries, extensions);
}

/**
 * Index the translation files of a directory by locale and domain
 */
export async function listTranslationFiles(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<TranslationFileIndex> {
  return indexFiles(await readTranslationFiles(dir, extensions));
}

export function listTranslationFilesSync(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): TranslationFileIndex {
  return indexFiles(readTranslationFilesSync(dir, extensions));
}

/**
 * Load every translation file of a directory into a new CatalogueBag.
 * Files are read in parallel.
 *
 * @throws CatalogueLoadError on the first unreadable directory, file name or file
 */
export async function loadCatalogueBag(dir: string, options: LoaderOptions = {}): Promise<CatalogueBag> {
  const timer = createTimer('load-catalogues', log);
  const files = await readTranslationFiles(dir, options.extensions ?? DEFAULT_EXTENSIONS);

  const contents = await Promise.all(
    files.map(async (file) => {
      try {
        return await fs.promises.readFile(file.path, 'utf8');
      } catch (error) {
        throw fileError(file.path, error);
      }
    })
  );

  const bag = buildBag(files, contents);
  timer.end({ dir, files: files.length, locales: bag.size });
  return bag;
}

export function loadCatalogueBagSync(dir: string, options: LoaderOptions = {}): CatalogueBag {
  const timer = createTimer('load-catalogues', log);
  const files = readTranslationFilesSync(dir, options.extensions ?? DEFAULT_EXTENSIONS);

  const contents = files.map((file) => {
    try {
      return fs.readFileSync(file.path, 'utf8');
    } catch (error) {
      throw fileError(file.path, error);
    }
  });

  const bag = buildBag(files, contents);
  timer.end({ dir, files: files.length, locales: bag.size });
  return bag;
}
