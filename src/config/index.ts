/**
 * i18n Configuration
 *
 * Reads the I18N_* environment variables (optionally from a .env file) and
 * validates them.
 *
 *   I18N_DEFAULT_LOCALE       default locale tag (default: en)
 *   I18N_FALLBACK_LOCALE      fallback locale tag, or "none" (default: the default locale)
 *   I18N_TRANSLATIONS_DIR     translation file directory (default: translations)
 *   I18N_FILE_EXTENSIONS      comma-separated extensions (default: json)
 *   I18N_TEMPLATE_CACHE_SIZE  parsed template cache capacity (default: 500)
 *   LOG_LEVEL                 debug | info | warn | error (default: info)
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '../errors/TranslationError';
import { DEFAULT_TEMPLATE_CACHE_SIZE } from '../i18n/formatter';
import { I18nConfigSchema, formatIssues } from './schema';
import type { I18nConfig } from './types';

export type Environment = Record<string, string | undefined>;

const DISABLED = 'none';

/**
 * Load a .env file into process.env and return it.
 * Variables already set in the environment take precedence.
 */
export function loadEnv(path?: string): Environment {
  dotenv.config(path ? { path } : {});
  return process.env;
}

function parseExtensions(value: string | undefined): string[] {
  if (!value) return ['json'];
  return value
    .split(',')
    .map((extension) => extension.trim().replace(/^\./, '').toLowerCase())
    .filter((extension) => extension.length > 0);
}

function parseFallbackLocale(value: string | undefined, defaultLocale: string): string | null {
  if (!value) return defaultLocale;
  return value.trim().toLowerCase() === DISABLED ? null : value.trim();
}

/**
 * Map environment variables onto the unvalidated config shape
 */
export function readRawConfig(env: Environment): Record<string, unknown> {
  const defaultLocale = env.I18N_DEFAULT_LOCALE?.trim() || 'en';

  return {
    defaultLocale,
    fallbackLocale: parseFallbackLocale(env.I18N_FALLBACK_LOCALE, defaultLocale),
    translationsDir: env.I18N_TRANSLATIONS_DIR?.trim() || 'translations',
    fileExtensions: parseExtensions(env.I18N_FILE_EXTENSIONS),
    templateCacheSize: env.I18N_TEMPLATE_CACHE_SIZE
      ? Number(env.I18N_TEMPLATE_CACHE_SIZE.trim())
      : DEFAULT_TEMPLATE_CACHE_SIZE,
    logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
  };
}

/**
 * Build a validated configuration. Locale tags come back in canonical form.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: Environment = loadEnv()): I18nConfig {
  const result = I18nConfigSchema.safeParse(readRawConfig(env));
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error.issues));
  }
  return result.data;
}

export type { I18nConfig, LogLevelName } from './types';
export { validateConfigSchema, I18nConfigSchema } from './schema';
