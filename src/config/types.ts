/**
 * Configuration Types
 *
 * @module config/types
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Settings the translation runtime reads at startup
 */
export interface I18nConfig {
  /** Canonical tag used when a request names no usable locale */
  defaultLocale: string;
  /** Canonical tag tried after a request's own chain; null disables */
  fallbackLocale: string | null;
  /** Directory holding `{domain}.{locale}.{ext}` files */
  translationsDir: string;
  /** Lowercase extensions without the dot */
  fileExtensions: string[];
  /** Parsed templates kept by the formatter */
  templateCacheSize: number;
  logLevel: LogLevelName;
}
