/**
 * Message Catalogues
 *
 * A Catalogue maps (domain, id) to a raw template for one locale.
 * A CatalogueBag holds at most one Catalogue per locale and merges on insert.
 *
 * @module i18n/catalogue
 */

import type { Locale } from './locale';

export type DomainMessages = Readonly<Record<string, string>>;
export type CatalogueMessages = Readonly<Record<string, DomainMessages>>;

/**
 * Read-only view handed out by a bag and held by a translator
 */
export interface ReadonlyCatalogue {
  readonly locale: Locale;
  readonly size: number;
  get(domain: string, id: string): string | undefined;
  has(domain: string, id: string): boolean;
  domains(): string[];
  getAll(domain: string): Record<string, string> | undefined;
  toJSON(): Record<string, Record<string, string>>;
}

export interface ReadonlyCatalogueBag {
  readonly size: number;
  get(locale: Locale): ReadonlyCatalogue | undefined;
  has(locale: Locale): boolean;
  locales(): Locale[];
  isEmpty(): boolean;
}

export class Catalogue implements ReadonlyCatalogue {
  private readonly messages = new Map<string, Map<string, string>>();

  constructor(
    readonly locale: Locale,
    messages: CatalogueMessages = {}
  ) {
    for (const [domain, entries] of Object.entries(messages)) {
      for (const [id, template] of Object.entries(entries)) {
        this.insert(domain, id, template);
      }
    }
  }

  static withMessages(locale: Locale, messages: CatalogueMessages): Catalogue {
    return new Catalogue(locale, messages);
  }

  /**
   * Number of messages across all domains
   */
  get size(): number {
    let total = 0;
    for (const entries of this.messages.values()) {
      total += entries.size;
    }
    return total;
  }

  get(domain: string, id: string): string | undefined {
    return this.messages.get(domain)?.get(id);
  }

  has(domain: string, id: string): boolean {
    return this.messages.get(domain)?.has(id) ?? false;
  }

  /**
   * Domain names, sorted
   */
  domains(): string[] {
    return [...this.messages.keys()].sort();
  }

  getAll(domain: string): Record<string, string> | undefined {
    const entries = this.messages.get(domain);
    return entries ? Object.fromEntries(entries) : undefined;
  }

  /**
   * Insert or overwrite a template.
   *
   * @returns the template previously stored under (domain, id)
   */
  insert(domain: string, id: string, template: string): string | undefined {
    let entries = this.messages.get(domain);
    if (!entries) {
      entries = new Map();
      this.messages.set(domain, entries);
    }
    const previous = entries.get(id);
    entries.set(id, template);
    return previous;
  }

  remove(domain: string, id: string): string | undefined {
    const entries = this.messages.get(domain);
    const previous = entries?.get(id);
    entries?.delete(id);
    return previous;
  }

  removeAll(domain: string): Record<string, string> | undefined {
    const removed = this.getAll(domain);
    this.messages.delete(domain);
    return removed;
  }

  /**
   * Copy every message of `other` into this catalogue; `other` wins on collisions.
   */
  merge(other: ReadonlyCatalogue): this {
    for (const domain of other.domains()) {
      for (const [id, template] of Object.entries(other.getAll(domain) ?? {})) {
        this.insert(domain, id, template);
      }
    }
    return this;
  }

  clone(): Catalogue {
    return new Catalogue(this.locale).merge(this);
  }

  toJSON(): Record<string, Record<string, string>> {
    const result: Record<string, Record<string, string>> = {};
    for (const domain of this.domains()) {
      result[domain] = this.getAll(domain) ?? {};
    }
    return result;
  }
}

export class CatalogueBag implements ReadonlyCatalogueBag {
  private readonly catalogues = new Map<Locale, Catalogue>();

  constructor(catalogues: Iterable<ReadonlyCatalogue> = []) {
    for (const catalogue of catalogues) {
      this.insert(catalogue);
    }
  }

  static withCatalogues(catalogues: Iterable<ReadonlyCatalogue>): CatalogueBag {
    return new CatalogueBag(catalogues);
  }

  get size(): number {
    return this.catalogues.size;
  }

  /**
   * Add a catalogue, merging into the existing one for the same locale.
   * The bag keeps its own copy.
   */
  insert(catalogue: ReadonlyCatalogue): this {
    const existing = this.catalogues.get(catalogue.locale);
    if (existing) {
      existing.merge(catalogue);
    } else {
      this.catalogues.set(catalogue.locale, new Catalogue(catalogue.locale).merge(catalogue));
    }
    return this;
  }

  /**
   * Move every catalogue of `other` into this bag, leaving `other` empty.
   */
  append(other: CatalogueBag): this {
    for (const catalogue of other.catalogues.values()) {
      this.insert(catalogue);
    }
    other.catalogues.clear();
    return this;
  }

  get(locale: Locale): ReadonlyCatalogue | undefined {
    return this.catalogues.get(locale);
  }

  has(locale: Locale): boolean {
    return this.catalogues.has(locale);
  }

  /**
   * Locales with a catalogue, in canonical locale order
   */
  locales(): Locale[] {
    return [...this.catalogues.keys()].sort((a, b) => a.compare(b));
  }

  isEmpty(): boolean {
    return this.catalogues.size === 0;
  }
}
