/**
 * Internationalization Middleware
 *
 * Detects and sets the locale for each request based on:
 * 1. X-Locale header (explicit)
 * 2. Accept-Language header (browser preference)
 * 3. Default locale (fallback)
 *
 * The locale lives on the request object, not in service state.
 *
 * @module middleware/i18n
 */

import type { Request, Response, NextFunction } from 'express';
import type { ContextInput } from '../i18n/context';
import { Locale } from '../i18n/locale';
import type { I18nService } from '../i18n/i18nService';
import type { Translator } from '../i18n/translator';
import { createLogger } from '../utils/logger';

const log = createLogger('I18N');

declare global {
  namespace Express {
    interface Request {
      locale: Locale;
      translator: Translator;
      t: (domain: string, id: string, context?: ContextInput) => string;
    }
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve the locale a request asks for
 */
export function detectLocale(req: Request, service: I18nService): Locale {
  const explicitLocale = headerValue(req.headers['x-locale'])?.trim();
  if (explicitLocale) {
    const locale = Locale.tryFromTag(explicitLocale);
    if (locale) return locale;
    log.warn('Ignoring unknown X-Locale header', { value: explicitLocale });
  }

  return service.parseAcceptLanguage(req.headers['accept-language']);
}

/**
 * Middleware to detect and set request locale
 *
 * Attaches the locale, the shared translator and a translate function bound
 * to the locale. Errors from `req.t` reach the caller unchanged.
 */
export function i18nMiddleware(service: I18nService) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    let translator: Translator;
    try {
      translator = service.getTranslator();
    } catch (error) {
      next(error);
      return;
    }

    const locale = detectLocale(req, service);
    req.locale = locale;
    req.translator = translator;
    req.t = (domain: string, id: string, context?: ContextInput): string =>
      translator.translate(locale, domain, id, context);

    next();
  };
}

/**
 * Get the locale from a request (for use in services)
 */
export function getRequestLocale(req: Request, fallback: Locale): Locale {
  return req.locale || fallback;
}
