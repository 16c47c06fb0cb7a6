/**
 * Internationalization Module
 *
 * Locale model, catalogues, template formatting and the translator, plus the
 * service that loads them for an application.
 *
 * @module i18n
 */

export { Locale, toLocale } from './locale';
export type { LocaleKind } from './locale';

export { Context, context, COUNT_KEY } from './context';
export type { ContextInput, ContextValue } from './context';

export { Catalogue, CatalogueBag } from './catalogue';
export type { CatalogueMessages, DomainMessages, ReadonlyCatalogue, ReadonlyCatalogueBag } from './catalogue';

export { parseTemplate, selectBranch, matchesGuard, toComparableCount } from './plural';
export type { ParsedTemplate, PluralBranch, PluralGuard } from './plural';

export { interpolate, displayValue } from './interpolator';

export { DefaultMessageFormatter, DEFAULT_TEMPLATE_CACHE_SIZE } from './formatter';
export type { DefaultMessageFormatterOptions, FormatResult, MessageFormatter } from './formatter';

export { Translator } from './translator';
export type { ResolvedTemplate, TranslationResult, TranslatorOptions } from './translator';

export { I18nService, parseLanguageRanges } from './i18nService';
export type { I18nServiceConfig, II18nService } from './types';

export { i18nMiddleware, getRequestLocale, detectLocale } from '../middleware/i18n';
