/**
 * Translation File Loader Tests
 *
 * Tests for file name parsing, content validation and directory loading
 * against the fixtures under tests/fixtures.
 */

import { describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import { join } from 'path';
import {
  listTranslationFiles,
  listTranslationFilesSync,
  loadCatalogueBag,
  loadCatalogueBagSync,
  parseFileName,
  parseMessages,
} from '../../../src/loader/fileLoader';
import { Locale } from '../../../src/i18n/locale';
import { CatalogueLoadError } from '../../../src/errors/TranslationError';

const FIXTURES = join(__dirname, '../../fixtures');
const TRANSLATIONS = join(FIXTURES, 'translations');

const en = Locale.fromTag('en');
const enGB = Locale.fromTag('en-GB');
const fr = Locale.fromTag('fr');
const frCA = Locale.fromTag('fr-CA');

async function loadError(dir: string): Promise<CatalogueLoadError> {
  try {
    await loadCatalogueBag(dir);
  } catch (error) {
    if (error instanceof CatalogueLoadError) return error;
    throw error;
  }
  throw new Error(`expected loading '${dir}' to fail`);
}

describe('parseFileName', () => {
  it('should split domain and locale', () => {
    expect(parseFileName('messages.en.json', '/srv/i18n')).toEqual({
      path: join('/srv/i18n', 'messages.en.json'),
      domain: 'messages',
      locale: en,
    });
  });

  it('should keep dots in the domain', () => {
    const file = parseFileName('app.menu.de_AT.json', '/srv/i18n');

    expect(file?.domain).toBe('app.menu');
    expect(file?.locale).toBe(Locale.fromTag('de-AT'));
  });

  it('should match extensions without regard to case', () => {
    expect(parseFileName('errors.FR.JSON', '/srv/i18n')?.locale).toBe(fr);
  });

  it('should skip files with other extensions', () => {
    expect(parseFileName('README.md', '/srv/i18n')).toBeUndefined();
    expect(parseFileName('messages.en.yaml', '/srv/i18n')).toBeUndefined();
    expect(parseFileName('messages', '/srv/i18n')).toBeUndefined();
  });

  it('should accept configured extensions', () => {
    expect(parseFileName('messages.en.yaml', '/srv/i18n', ['yaml'])?.domain).toBe('messages');
  });

  it('should reject accepted files without a domain or locale', () => {
    expect(() => parseFileName('messages.json', '/srv/i18n')).toThrow(
      "Translation file 'messages.json' must be named {domain}.{locale}.json"
    );
    expect(() => parseFileName('.en.json', '/srv/i18n')).toThrow(CatalogueLoadError);
    expect(() => parseFileName('messages..json', '/srv/i18n')).toThrow(CatalogueLoadError);
  });

  it('should reject unknown locales', () => {
    try {
      parseFileName('messages.xx.json', '/srv/i18n');
      expect.fail('expected CatalogueLoadError');
    } catch (error) {
      expect(error).toBeInstanceOf(CatalogueLoadError);
      if (error instanceof CatalogueLoadError) {
        expect(error.code).toBe('INVALID_FILENAME');
        expect(error.message).toBe("Translation file 'messages.xx.json' names unknown locale 'xx'");
        expect(error.path).toBe(join('/srv/i18n', 'messages.xx.json'));
      }
    }
  });
});

describe('parseMessages', () => {
  it('should return a flat message map', () => {
    expect(parseMessages('{"greeting":"Hello"}', 'messages.en.json')).toEqual({ greeting: 'Hello' });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseMessages('{', 'messages.en.json')).toThrow(
      "Translation file 'messages.en.json' is not valid JSON"
    );
  });

  it('should reject content that is not a flat object of strings', () => {
    expect(() => parseMessages('["Hello"]', 'messages.en.json')).toThrow(CatalogueLoadError);
    expect(() => parseMessages('null', 'messages.en.json')).toThrow(CatalogueLoadError);
    expect(() => parseMessages('{"count":1}', 'messages.en.json')).toThrow(
      "Translation file 'messages.en.json' must be a flat object of string messages"
    );
  });

  it('should reject a reserved message id', () => {
    try {
      parseMessages('{"__proto__":"x","a":"b"}', 'messages.en.json');
      expect.fail('expected CatalogueLoadError');
    } catch (error) {
      expect(error).toBeInstanceOf(CatalogueLoadError);
      if (error instanceof CatalogueLoadError) {
        expect(error.code).toBe('INVALID_FILE_CONTENT');
        expect(error.details?.issues).toEqual([
          { path: '__proto__', message: "'__proto__' is a reserved message id" },
        ]);
      }
    }
  });
});

describe('listTranslationFiles', () => {
  it('should index files by locale and domain', async () => {
    const index = await listTranslationFiles(TRANSLATIONS);

    expect([...index.keys()]).toEqual(['en-GB', 'en', 'fr-CA', 'fr']);
    expect([...(index.get('en')?.keys() ?? [])]).toEqual(['errors', 'messages']);
    expect(index.get('en')?.get('messages')).toEqual([join(TRANSLATIONS, 'messages.en.json')]);
    expect(index.get('en-GB')?.get('app.menu')).toEqual([join(TRANSLATIONS, 'app.menu.en_GB.json')]);
  });

  it('should skip subdirectories', () => {
    const index = listTranslationFilesSync(TRANSLATIONS);

    expect(index.has('de')).toBe(false);
  });

  it('should include configured extensions', () => {
    const index = listTranslationFilesSync(TRANSLATIONS, ['json', 'txt']);

    expect([...(index.get('en')?.keys() ?? [])]).toEqual(['errors', 'messages', 'notes']);
  });
});

describe('loadCatalogueBag', () => {
  it('should load every catalogue of a directory', async () => {
    const bag = await loadCatalogueBag(TRANSLATIONS);

    expect(bag.locales()).toEqual([en, enGB, fr, frCA]);
    expect(bag.get(en)?.domains()).toEqual(['errors', 'messages']);
    expect(bag.get(en)?.get('messages', 'greeting')).toBe('Hello, {name}!');
    expect(bag.get(enGB)?.get('app.menu', 'open')).toBe('Open');
    expect(bag.get(frCA)?.get('messages', 'greeting')).toBe('Salut, {name}!');
  });

  it('should load the same bag synchronously', async () => {
    const asyncBag = await loadCatalogueBag(TRANSLATIONS);
    const syncBag = loadCatalogueBagSync(TRANSLATIONS);

    expect(syncBag.locales()).toEqual(asyncBag.locales());
    for (const locale of asyncBag.locales()) {
      expect(syncBag.get(locale)?.toJSON()).toEqual(asyncBag.get(locale)?.toJSON());
    }
  });

  it('should load files with configured extensions', () => {
    const bag = loadCatalogueBagSync(TRANSLATIONS, { extensions: ['txt'] });

    expect(bag.locales()).toEqual([en]);
    expect(bag.get(en)?.toJSON()).toEqual({ notes: { note: 'Plain' } });
  });

  it('should fail for a missing directory', async () => {
    const error = await loadError(join(FIXTURES, 'does-not-exist'));

    expect(error.code).toBe('DIRECTORY_UNREADABLE');
    expect(error.path).toBe(join(FIXTURES, 'does-not-exist'));
  });

  it('should fail synchronously for a missing directory', () => {
    expect(() => loadCatalogueBagSync(join(FIXTURES, 'does-not-exist'))).toThrow(
      `Translation directory '${join(FIXTURES, 'does-not-exist')}' could not be read`
    );
  });

  it('should fail for a file without a locale', async () => {
    const error = await loadError(join(FIXTURES, 'invalid-filename'));

    expect(error.code).toBe('INVALID_FILENAME');
  });

  it('should fail for a file naming an unknown locale', async () => {
    const error = await loadError(join(FIXTURES, 'unknown-locale'));

    expect(error.code).toBe('INVALID_FILENAME');
    expect(error.details).toEqual({ path: join(FIXTURES, 'unknown-locale', 'messages.xx.json'), tag: 'xx' });
  });

  it('should fail for a file that is not JSON', async () => {
    const error = await loadError(join(FIXTURES, 'invalid-json'));

    expect(error.code).toBe('INVALID_FILE_CONTENT');
    expect(error.path).toBe(join(FIXTURES, 'invalid-json', 'messages.en.json'));
  });

  it('should fail for nested message objects', async () => {
    const error = await loadError(join(FIXTURES, 'invalid-shape'));

    expect(error.code).toBe('INVALID_FILE_CONTENT');
    expect(error.details?.issues).toEqual([
      { path: 'nested', message: expect.any(String) },
    ]);
  });

  it('should fail for an unreadable file', async () => {
    vi.spyOn(fs.promises, 'readFile').mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const error = await loadError(TRANSLATIONS);

    expect(error.code).toBe('FILE_UNREADABLE');
    expect(error.details).toMatchObject({ error: 'EACCES: permission denied' });
  });
});
