/**
 * Translator
 *
 * Resolves (locale, domain, id) against a catalogue bag, walking the locale's
 * fallback chain and finally the configured fallback locale, then formats the
 * template with the caller's context.
 *
 * A Translator is meant to be built once and shared by reference. The only
 * mutable setting is the fallback locale; change it during setup.
 *
 * @example
 * const translator = new Translator(bag, { fallbackLocale: 'en' });
 * translator.translate(Locale.fromTag('fr-CA'), 'messages', 'greeting', { name: 'Ada' });
 *
 * @module i18n/translator
 */

import { Context } from './context';
import type { ContextInput } from './context';
import { toLocale } from './locale';
import type { Locale } from './locale';
import type { ReadonlyCatalogueBag } from './catalogue';
import { DefaultMessageFormatter } from './formatter';
import type { MessageFormatter } from './formatter';
import {
  MessageNotFoundError,
  MissingPluralContextError,
  TranslationError,
} from '../errors/TranslationError';

export interface TranslatorOptions {
  /** Locale tried after the requested locale's own chain */
  fallbackLocale?: Locale | string | null;
  /** Replaces the default plural + interpolation formatter */
  formatter?: MessageFormatter;
}

export interface ResolvedTemplate {
  locale: Locale;
  template: string;
}

export type TranslationResult =
  | { success: true; message: string; locale: Locale }
  | { success: false; error: TranslationError };

export class Translator {
  private fallbackLocale: Locale | null;
  private readonly formatter: MessageFormatter;

  constructor(
    private readonly bag: ReadonlyCatalogueBag,
    options: TranslatorOptions = {}
  ) {
    this.fallbackLocale = options.fallbackLocale ? toLocale(options.fallbackLocale) : null;
    this.formatter = options.formatter ?? new DefaultMessageFormatter();
  }

  static withCatalogueBag(bag: ReadonlyCatalogueBag): Translator {
    return new Translator(bag);
  }

  /**
   * Set or clear the fallback locale. Tags are parsed strictly.
   *
   * @throws LocaleParseError for an unknown tag
   */
  setFallbackLocale(locale: Locale | string | null): void {
    this.fallbackLocale = locale === null ? null : toLocale(locale);
  }

  getFallbackLocale(): Locale | null {
    return this.fallbackLocale;
  }

  getCatalogueBag(): ReadonlyCatalogueBag {
    return this.bag;
  }

  /**
   * Locales tried for a request, most specific first, without duplicates.
   */
  fallbackChain(locale: Locale): Locale[] {
    const chain = locale.fallbackChain();
    for (const candidate of this.fallbackLocale?.fallbackChain() ?? []) {
      if (!chain.includes(candidate)) {
        chain.push(candidate);
      }
    }
    return chain;
  }

  /**
   * First template found along the fallback chain, unformatted.
   */
  resolve(locale: Locale, domain: string, id: string): ResolvedTemplate | undefined {
    return this.findTemplate(this.fallbackChain(locale), domain, id);
  }

  has(locale: Locale, domain: string, id: string): boolean {
    return this.resolve(locale, domain, id) !== undefined;
  }

  /**
   * Translate a message.
   *
   * When the resolved template is pluralized, the context count selects the branch.
   *
   * @throws MessageNotFoundError when no locale in the chain defines the message
   * @throws MissingPluralContextError when a pluralized template gets no count
   * @throws TemplateError when the template is malformed
   */
  translate(locale: Locale, domain: string, id: string, context?: ContextInput): string {
    return this.render(locale, domain, id, context).message;
  }

  /**
   * Same as translate, with translation errors returned instead of thrown.
   */
  tryTranslate(locale: Locale, domain: string, id: string, context?: ContextInput): TranslationResult {
    try {
      const { message, locale: resolvedLocale } = this.render(locale, domain, id, context);
      return { success: true, message, locale: resolvedLocale };
    } catch (error) {
      if (error instanceof TranslationError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private render(locale: Locale, domain: string, id: string, context: ContextInput): { message: string; locale: Locale } {
    const chain = this.fallbackChain(locale);
    const resolved = this.findTemplate(chain, domain, id);
    if (!resolved) {
      throw new MessageNotFoundError(domain, id, chain);
    }

    const result = this.formatter.format(resolved.locale, resolved.template, Context.from(context));
    if (result.kind === 'missingCount') {
      throw new MissingPluralContextError(resolved.locale, domain, id);
    }
    return { message: result.message, locale: resolved.locale };
  }

  private findTemplate(chain: Locale[], domain: string, id: string): ResolvedTemplate | undefined {
    for (const candidate of chain) {
      const template = this.bag.get(candidate)?.get(domain, id);
      if (template !== undefined) {
        return { locale: candidate, template };
      }
    }
    return undefined;
  }
}
