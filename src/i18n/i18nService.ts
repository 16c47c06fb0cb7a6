/**
 * Internationalization Service
 *
 * Owns the translator for an application: loads the catalogue bag once,
 * applies the configured fallback locale and negotiates request locales.
 *
 * Locale is passed per call rather than stored as instance state, so one
 * service can serve concurrent requests in different languages.
 *
 * @module i18n/i18nService
 */

import { createLogger } from '../utils/logger';
import { ConfigurationError } from '../errors/TranslationError';
import { loadCatalogueBag } from '../loader/fileLoader';
import { CatalogueBag } from './catalogue';
import type { ContextInput } from './context';
import { DefaultMessageFormatter } from './formatter';
import { Locale, toLocale } from './locale';
import { Translator } from './translator';
import type { I18nServiceConfig, II18nService } from './types';

const log = createLogger('I18N');

const WILDCARD = '*';

interface LanguageRange {
  range: string;
  q: number;
}

/**
 * Split an Accept-Language header into ranges ordered by preference.
 * Entries with q=0, a malformed q, or the `*` range are dropped.
 */
export function parseLanguageRanges(header: string): string[] {
  const ranges: LanguageRange[] = [];

  for (const part of header.split(',')) {
    const [rawRange, ...params] = part.split(';');
    const range = rawRange.trim();
    if (!range || range === WILDCARD) continue;

    let q = 1;
    for (const param of params) {
      const [name, value] = param.split('=');
      if (name.trim().toLowerCase() === 'q') {
        q = value === undefined ? Number.NaN : Number(value.trim());
      }
    }
    if (!Number.isFinite(q) || q <= 0) continue;

    ranges.push({ range, q });
  }

  // Array.prototype.sort is stable: equal q keeps header order
  return ranges.sort((a, b) => b.q - a.q).map(({ range }) => range);
}

export class I18nService implements II18nService {
  private readonly defaultLocale: Locale;
  private readonly fallbackLocale: Locale | null;
  private translator: Translator | null = null;
  private initializing: Promise<void> | null = null;

  /**
   * @throws LocaleParseError when a configured locale tag is unknown
   */
  constructor(private readonly config: I18nServiceConfig) {
    this.defaultLocale = toLocale(config.defaultLocale);
    this.fallbackLocale =
      config.fallbackLocale === undefined
        ? this.defaultLocale
        : config.fallbackLocale === null
          ? null
          : toLocale(config.fallbackLocale);
  }

  /**
   * Load translations from the configured directory. Later calls reuse the
   * first load.
   *
   * @throws ConfigurationError when no translations directory is configured
   * @throws CatalogueLoadError when the directory or a file cannot be loaded
   */
  async initialize(): Promise<void> {
    if (this.translator) return;

    if (!this.initializing) {
      this.initializing = this.load().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async load(): Promise<void> {
    const dir = this.config.translationsDir;
    if (!dir) {
      throw new ConfigurationError(['translationsDir: a translations directory is required to initialize']);
    }

    const bag = await loadCatalogueBag(dir, { extensions: this.config.fileExtensions });
    this.initializeWithBag(bag);
  }

  initializeWithBag(bag: CatalogueBag): void {
    this.translator = new Translator(bag, {
      fallbackLocale: this.fallbackLocale,
      formatter: new DefaultMessageFormatter({ cacheSize: this.config.templateCacheSize }),
    });

    if (!bag.has(this.defaultLocale)) {
      log.warn('Default locale has no catalogue', { defaultLocale: this.defaultLocale.toTag() });
    }

    log.info('I18n service initialized', {
      defaultLocale: this.defaultLocale.toTag(),
      fallbackLocale: this.fallbackLocale?.toTag() ?? null,
      locales: bag.locales().map((locale) => locale.toTag()),
    });
  }

  isInitialized(): boolean {
    return this.translator !== null;
  }

  /**
   * @throws Error when called before initialization
   */
  getTranslator(): Translator {
    if (!this.translator) {
      throw new Error('I18n service is not initialized');
    }
    return this.translator;
  }

  /**
   * Translate a message for an explicit locale
   *
   * @throws LocaleParseError for an unknown locale tag
   * @throws MessageNotFoundError, MissingPluralContextError or TemplateError from the translator
   */
  translate(locale: Locale | string, domain: string, id: string, context?: ContextInput): string {
    return this.getTranslator().translate(toLocale(locale), domain, id, context);
  }

  getDefaultLocale(): Locale {
    return this.defaultLocale;
  }

  getFallbackLocale(): Locale | null {
    return this.fallbackLocale;
  }

  getAvailableLocales(): Locale[] {
    return this.translator?.getCatalogueBag().locales() ?? [];
  }

  isSupported(tag: string): boolean {
    const locale = Locale.tryFromTag(tag);
    if (!locale || !this.translator) return false;

    const bag = this.translator.getCatalogueBag();
    return locale.fallbackChain().some((candidate) => bag.has(candidate));
  }

  /**
   * Pick the locale for an Accept-Language header: the most preferred range
   * naming a known locale, else the default locale. A range with an unknown
   * region or script falls back to its language subtag.
   *
   * @example
   * parseAcceptLanguage('fr-CA,fr;q=0.9,en;q=0.8') // fr-CA
   * parseAcceptLanguage('xx, de;q=0.5')            // de
   * parseAcceptLanguage(undefined)                 // the default locale
   */
  parseAcceptLanguage(header: string | undefined): Locale {
    if (!header) return this.defaultLocale;

    for (const range of parseLanguageRanges(header)) {
      const locale = Locale.tryFromTag(range) ?? Locale.tryFromTag(range.split(/[-_]/)[0]);
      if (locale) {
        log.debug('Negotiated locale', { header, locale: locale.toTag() });
        return locale;
      }
    }

    return this.defaultLocale;
  }
}
