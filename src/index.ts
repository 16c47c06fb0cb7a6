/**
 * lisan
 *
 * Locale-aware message resolution: fallback chains across regional variants,
 * plural branch selection and placeholder interpolation.
 *
 * @example
 * const service = await createI18nService();
 * service.translate('fr-CA', 'messages', 'apples', { count: 3 });
 */

import { loadConfig } from './config';
import type { Environment } from './config';
import { I18nService } from './i18n/i18nService';
import { setLogLevel } from './utils/logger';

export * from './i18n';
export * from './errors';
export * from './loader';
export { loadConfig, loadEnv, validateConfigSchema } from './config';
export type { Environment, I18nConfig, LogLevelName } from './config';
export { createLogger, setLogLevel, LogLevel } from './utils/logger';
export type { Logger } from './utils/logger';

/**
 * Read the configuration, then build and initialize a service from it
 *
 * @throws ConfigurationError when the environment is invalid
 * @throws CatalogueLoadError when the translations cannot be loaded
 */
export async function createI18nService(env?: Environment): Promise<I18nService> {
  const config = env ? loadConfig(env) : loadConfig();
  setLogLevel(config.logLevel);

  const service = new I18nService(config);
  await service.initialize();
  return service;
}
