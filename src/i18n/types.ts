/**
 * Internationalization Types
 *
 * @module i18n/types
 */

import type { CatalogueBag } from './catalogue';
import type { ContextInput } from './context';
import type { Locale } from './locale';
import type { Translator } from './translator';

/**
 * Settings for an I18nService. The config module's I18nConfig satisfies this.
 */
export interface I18nServiceConfig {
  defaultLocale: Locale | string;
  /** Omitted: the default locale. null: no fallback locale. */
  fallbackLocale?: Locale | string | null;
  /** Required by initialize(); not used by initializeWithBag() */
  translationsDir?: string;
  fileExtensions?: readonly string[];
  templateCacheSize?: number;
}

/**
 * i18n service interface
 */
export interface II18nService {
  /**
   * Load translations from the configured directory
   */
  initialize(): Promise<void>;

  /**
   * Use an already built bag instead of loading from disk
   */
  initializeWithBag(bag: CatalogueBag): void;

  isInitialized(): boolean;

  getTranslator(): Translator;

  /**
   * Translate a message for an explicit locale
   */
  translate(locale: Locale | string, domain: string, id: string, context?: ContextInput): string;

  getDefaultLocale(): Locale;

  getFallbackLocale(): Locale | null;

  /**
   * Locales that have a catalogue
   */
  getAvailableLocales(): Locale[];

  /**
   * Check whether a tag has translations of its own or through a parent
   */
  isSupported(tag: string): boolean;

  /**
   * Get locale from Accept-Language header
   */
  parseAcceptLanguage(header: string | undefined): Locale;
}
