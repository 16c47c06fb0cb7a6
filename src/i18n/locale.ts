/**
 * Locale Model
 *
 * Closed set of supported languages and their regional variants, loaded from
 * `locales.json`. Locales are interned: `Locale.fromTag('en-GB') === Locale.fromTag('en_gb')`.
 *
 * Fallback relationships:
 *   - a regional variant (`fr-CA`) falls back to its base language (`fr`)
 *   - a base language has no parent
 *
 * @module i18n/locale
 */

import { z } from 'zod';
import localeTable from './locales.json';
import { LocaleParseError } from '../errors/TranslationError';

const LocaleTableSchema = z.object({
  languages: z.array(
    z.object({
      code: z.string().regex(/^[a-z]{2,3}$/),
      name: z.string().min(1),
      regions: z.record(z.string().regex(/^[A-Z]{2}$/), z.string().min(1)).optional(),
    })
  ),
});

export type LocaleKind = 'base' | 'regional';

export class Locale {
  private static readonly table: ReadonlyMap<string, Locale> = Locale.buildTable();

  private constructor(
    readonly language: string,
    readonly region: string | null,
    readonly displayName: string,
    private readonly position: number
  ) {}

  private static buildTable(): Map<string, Locale> {
    const { languages } = LocaleTableSchema.parse(localeTable);
    const table = new Map<string, Locale>();

    for (const entry of languages) {
      table.set(entry.code, new Locale(entry.code, null, entry.name, table.size));
      for (const [region, regionName] of Object.entries(entry.regions ?? {})) {
        table.set(
          `${entry.code}-${region}`,
          new Locale(entry.code, region, `${entry.name} (${regionName})`, table.size)
        );
      }
    }

    return table;
  }

  private static normalize(tag: string): string | null {
    const parts = tag.trim().split(/[-_]/);
    if (parts.length === 1) {
      return parts[0].toLowerCase();
    }
    if (parts.length === 2) {
      return `${parts[0].toLowerCase()}-${parts[1].toUpperCase()}`;
    }
    return null;
  }

  /**
   * Parse a locale tag such as `en`, `en-GB` or `en_GB`.
   *
   * @throws LocaleParseError when the tag names no known locale
   */
  static fromTag(tag: string): Locale {
    const locale = Locale.tryFromTag(tag);
    if (!locale) {
      throw new LocaleParseError(tag);
    }
    return locale;
  }

  static tryFromTag(tag: string): Locale | undefined {
    const key = Locale.normalize(tag);
    return key === null ? undefined : Locale.table.get(key);
  }

  static isValidTag(tag: string): boolean {
    return Locale.tryFromTag(tag) !== undefined;
  }

  /**
   * Look up a locale by language code and optional region code.
   *
   * @throws LocaleParseError when the combination is not supported
   */
  static of(language: string, region?: string): Locale {
    return Locale.fromTag(region ? `${language}-${region}` : language);
  }

  /**
   * All supported locales in their canonical order.
   */
  static all(): Locale[] {
    return [...Locale.table.values()];
  }

  get kind(): LocaleKind {
    return this.region === null ? 'base' : 'regional';
  }

  /**
   * Canonical tag: `en` or `en-GB`.
   */
  toTag(): string {
    return this.region === null ? this.language : `${this.language}-${this.region}`;
  }

  /**
   * The next, less specific locale to try, or null for a base language.
   */
  parentFallback(): Locale | null {
    const kind = this.kind;
    switch (kind) {
      case 'base':
        return null;
      case 'regional':
        return Locale.fromTag(this.language);
      default: {
        const unreachable: never = kind;
        throw new Error(`Unknown locale kind: ${String(unreachable)}`);
      }
    }
  }

  /**
   * This locale followed by each successive parent.
   */
  fallbackChain(): Locale[] {
    const chain: Locale[] = [];
    let current: Locale | null = this;
    while (current) {
      chain.push(current);
      current = current.parentFallback();
    }
    return chain;
  }

  hasVariant(): boolean {
    return this.region !== null;
  }

  withDefaultVariant(): Locale {
    return this.parentFallback() ?? this;
  }

  equals(other: Locale): boolean {
    return this === other;
  }

  compare(other: Locale): number {
    return this.position - other.position;
  }

  toString(): string {
    return this.toTag();
  }

  toJSON(): string {
    return this.toTag();
  }
}

/**
 * Accept either a Locale or a tag; tags are parsed strictly.
 */
export function toLocale(locale: Locale | string): Locale {
  return typeof locale === 'string' ? Locale.fromTag(locale) : locale;
}
