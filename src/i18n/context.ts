/**
 * Translation Context
 *
 * Ordered named values for placeholder substitution, plus the optional count
 * that drives plural branch selection.
 *
 * @module i18n/context
 */

export type ContextValue = string | number | bigint | boolean;

/**
 * Anything `translate` accepts as a context:
 * - a `Context`
 * - a plain object (its `count` key also becomes the count)
 * - a bare count
 */
export type ContextInput =
  | Context
  | Readonly<Record<string, ContextValue | null | undefined>>
  | number
  | bigint
  | string
  | null
  | undefined;

export const COUNT_KEY = 'count';

export class Context {
  private readonly values: ReadonlyArray<readonly [string, ContextValue]>;
  readonly count: ContextValue | undefined;

  constructor(values: Iterable<readonly [string, ContextValue]> = [], count?: ContextValue) {
    this.values = [...values];
    this.count = count;
  }

  static empty(): Context {
    return new Context();
  }

  static from(input: ContextInput): Context {
    if (input instanceof Context) {
      return input;
    }
    if (input === null || input === undefined) {
      return new Context();
    }
    if (typeof input !== 'object') {
      return new Context([], input);
    }

    const values: Array<[string, ContextValue]> = [];
    for (const [name, value] of Object.entries(input)) {
      if (value !== null && value !== undefined) {
        values.push([name, value]);
      }
    }
    const count = input[COUNT_KEY];
    return new Context(values, count ?? undefined);
  }

  get size(): number {
    return this.values.length;
  }

  hasCount(): boolean {
    return this.count !== undefined;
  }

  /**
   * Value of the first entry with this name.
   */
  get(name: string): ContextValue | undefined {
    return this.values.find(([key]) => key === name)?.[1];
  }

  /**
   * Value at a position, in insertion order.
   */
  at(index: number): ContextValue | undefined {
    return this.values[index]?.[1];
  }

  entries(): Array<readonly [string, ContextValue]> {
    return [...this.values];
  }

  withCount(count: ContextValue): Context {
    return new Context(this.values, count);
  }
}

/**
 * Build a context from named values and an optional count.
 *
 * @example
 * context({ name: 'Ada' });
 * context({ fruit: 'apples' }, 3);
 */
export function context(values: Readonly<Record<string, ContextValue>> = {}, count?: ContextValue): Context {
  return new Context(Object.entries(values), count);
}
