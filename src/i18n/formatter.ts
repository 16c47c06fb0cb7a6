/**
 * Message Formatter
 *
 * Turns a resolved template into the final string: plural branch selection
 * followed by interpolation. Parsed templates are kept in an LRU cache so a
 * template is interpreted once.
 *
 * @module i18n/formatter
 */

import { LRUCache } from 'lru-cache';
import type { Context } from './context';
import type { Locale } from './locale';
import { interpolate } from './interpolator';
import { parseTemplate, selectBranch } from './plural';
import type { ParsedTemplate } from './plural';

export const DEFAULT_TEMPLATE_CACHE_SIZE = 500;

/**
 * Outcome of formatting. A pluralized template with no count is reported
 * rather than thrown so the translator can attach the message reference.
 */
export type FormatResult = { kind: 'formatted'; message: string } | { kind: 'missingCount' };

export interface MessageFormatter {
  /**
   * @throws TemplateError when the template is malformed
   */
  format(locale: Locale, template: string, context: Context): FormatResult;
}

export interface DefaultMessageFormatterOptions {
  /** Maximum number of parsed templates kept */
  cacheSize?: number;
}

export class DefaultMessageFormatter implements MessageFormatter {
  private readonly cache: LRUCache<string, ParsedTemplate>;

  constructor(options: DefaultMessageFormatterOptions = {}) {
    this.cache = new LRUCache<string, ParsedTemplate>({
      max: options.cacheSize ?? DEFAULT_TEMPLATE_CACHE_SIZE,
    });
  }

  /**
   * Parse a template, reusing an earlier parse of the same string
   */
  parse(template: string): ParsedTemplate {
    const cached = this.cache.get(template);
    if (cached !== undefined) {
      return cached;
    }
    const parsed = parseTemplate(template);
    this.cache.set(template, parsed);
    return parsed;
  }

  format(_locale: Locale, template: string, context: Context): FormatResult {
    const parsed = this.parse(template);

    if (parsed.kind === 'simple') {
      return { kind: 'formatted', message: interpolate(parsed.text, context) };
    }
    if (context.count === undefined) {
      return { kind: 'missingCount' };
    }
    return { kind: 'formatted', message: interpolate(selectBranch(parsed, context.count), context) };
  }

  getStats(): { size: number; max: number } {
    return { size: this.cache.size, max: this.cache.max };
  }
}
