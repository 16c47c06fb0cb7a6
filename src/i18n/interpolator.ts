/**
 * Placeholder Interpolation
 *
 * Token forms:
 *   {name}  - named value
 *   {0}     - positional value, in context order
 *   {}      - next positional value
 *   {?}     - the count
 *   {{ }}   - literal braces
 *
 * A token with nothing to substitute stays in the output as written.
 *
 * @module i18n/interpolator
 */

import type { Context, ContextValue } from './context';

const COUNT_TOKEN = '?';
const INDEX_PATTERN = /^\d+$/;

/**
 * Locale-independent display text for a context value.
 */
export function displayValue(value: ContextValue): string {
  return String(value);
}

export function interpolate(text: string, context: Context): string {
  let output = '';
  let position = 0;
  let sequence = 0;

  const resolve = (inner: string): ContextValue | undefined => {
    if (inner === '') {
      return context.at(sequence++);
    }
    const name = inner.trim();
    if (INDEX_PATTERN.test(name)) {
      return context.at(Number(name));
    }
    if (name === COUNT_TOKEN) {
      return context.count;
    }
    return context.get(name);
  };

  while (position < text.length) {
    const char = text[position];

    if (char === '}') {
      output += '}';
      position += text[position + 1] === '}' ? 2 : 1;
      continue;
    }

    if (char !== '{') {
      output += char;
      position++;
      continue;
    }

    if (text[position + 1] === '{') {
      output += '{';
      position += 2;
      continue;
    }

    const close = text.indexOf('}', position + 1);
    if (close === -1) {
      output += text.slice(position);
      break;
    }

    const value = resolve(text.slice(position + 1, close));
    output += value === undefined ? text.slice(position, close + 1) : displayValue(value);
    position = close + 1;
  }

  return output;
}
