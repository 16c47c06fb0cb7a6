/**
 * Plural Templates
 *
 * Parses a raw template into guarded branches and selects the branch for a count.
 *
 * Template syntax:
 *   "{0} No apples | {1} One apple | {2..4} A few apples | {5..} Many apples | {?} apples"
 *
 * Guards:
 *   {1} or {1, 2, 3}  - count equals one of the values
 *   {2..4}            - 2 <= count <= 4
 *   {..4}             - count <= 4
 *   {5..}             - count >= 5
 *
 * The last branch never carries a guard and is used when nothing else matches.
 * `||` is a literal pipe.
 *
 * @module i18n/plural
 */

import { TemplateError } from '../errors/TranslationError';
import type { ContextValue } from './context';

export type PluralGuard =
  | { kind: 'match'; values: number[] }
  | { kind: 'range'; from: number; to: number }
  | { kind: 'rangeFrom'; from: number }
  | { kind: 'rangeTo'; to: number };

export interface PluralBranch {
  guard: PluralGuard;
  text: string;
}

export type ParsedTemplate =
  | { kind: 'simple'; text: string }
  | { kind: 'plural'; branches: PluralBranch[]; fallback: string };

const PIPE = '|';
const INTEGER_PATTERN = /^[+-]?\d+$/;

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

function unescapePipes(text: string): string {
  return text.replace(/\|\|/g, PIPE);
}

/**
 * Split on single pipes. In a run of pipes, a split happens at an odd position
 * that is followed by something other than a pipe.
 */
function splitBranches(template: string): string[] {
  if (!template.includes(PIPE)) {
    return [template];
  }

  const graphemes = Array.from(graphemeSegmenter.segment(template), (part) => part.segment);
  const branches: string[] = [];
  let run = 0;
  let start = 0;

  for (let i = 0; i < graphemes.length; i++) {
    if (graphemes[i] !== PIPE) {
      run = 0;
      continue;
    }
    run++;
    if (i + 1 < graphemes.length && graphemes[i + 1] !== PIPE && run % 2 !== 0) {
      branches.push(graphemes.slice(start, i).join(''));
      start = i + 1;
    }
  }

  branches.push(graphemes.slice(start).join(''));
  return branches;
}

function parseInteger(raw: string, describe: () => string, template: string): number {
  const value = raw.trim();
  const parsed = Number(value);
  if (!INTEGER_PATTERN.test(value) || !Number.isSafeInteger(parsed)) {
    throw new TemplateError(`${describe()}, '${value}' is not an integer`, template);
  }
  return parsed;
}

function parseGuard(body: string, branch: string, template: string): PluralGuard {
  const separator = body.indexOf('..');

  if (separator === -1) {
    const values = body
      .split(',')
      .map((value) => parseInteger(value, () => `failed to parse value in match guard for '${branch}'`, template));
    return { kind: 'match', values };
  }

  if (separator === 0) {
    const to = parseInteger(
      body.slice(2),
      () => `failed to parse 'to' value in range-to guard for '${branch}'`,
      template
    );
    return { kind: 'rangeTo', to };
  }

  if (separator === body.length - 2) {
    const from = parseInteger(
      body.slice(0, separator),
      () => `failed to parse 'from' value in range-from guard for '${branch}'`,
      template
    );
    return { kind: 'rangeFrom', from };
  }

  const from = parseInteger(
    body.slice(0, separator),
    () => `failed to parse 'from' value in range guard for '${branch}'`,
    template
  );
  const to = parseInteger(
    body.slice(separator + 2),
    () => `failed to parse 'to' value in range guard for '${branch}'`,
    template
  );
  return { kind: 'range', from, to };
}

function parseBranch(branch: string, template: string): PluralBranch {
  if (!branch.startsWith('{')) {
    throw new TemplateError(`failed to parse guard for '${branch}', expected '{'`, template);
  }
  const end = branch.indexOf('}');
  if (end === -1) {
    throw new TemplateError(`failed to parse guard for '${branch}', expected '}' but branch was terminated`, template);
  }

  return {
    guard: parseGuard(branch.slice(1, end), branch, template),
    text: unescapePipes(branch.slice(end + 1).trim()),
  };
}

/**
 * Interpret a raw template.
 *
 * @throws TemplateError when a guarded branch is malformed
 */
export function parseTemplate(template: string): ParsedTemplate {
  const parts = splitBranches(template);
  if (parts.length === 1) {
    return { kind: 'simple', text: unescapePipes(template) };
  }

  const trimmed = parts.map((part) => part.trim());
  const fallback = trimmed[trimmed.length - 1];
  const branches = trimmed.slice(0, -1).map((branch) => parseBranch(branch, template));

  return { kind: 'plural', branches, fallback: unescapePipes(fallback) };
}

/**
 * Numeric form of a count, or undefined when it has none.
 */
export function toComparableCount(count: ContextValue): number | undefined {
  switch (typeof count) {
    case 'number':
      return Number.isFinite(count) ? count : undefined;
    case 'bigint':
      // Guard bounds are safe integers, so rounding a larger bigint never crosses one
      return Number(count);
    case 'string': {
      const value = count.trim();
      if (value === '') return undefined;
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    default:
      return undefined;
  }
}

export function matchesGuard(guard: PluralGuard, count: number): boolean {
  switch (guard.kind) {
    case 'match':
      return guard.values.includes(count);
    case 'range':
      return count >= guard.from && count <= guard.to;
    case 'rangeFrom':
      return count >= guard.from;
    case 'rangeTo':
      return count <= guard.to;
  }
}

/**
 * First branch whose guard matches the count, else the fallback branch.
 */
export function selectBranch(template: Extract<ParsedTemplate, { kind: 'plural' }>, count: ContextValue): string {
  const value = toComparableCount(count);
  if (value === undefined) {
    return template.fallback;
  }

  const branch = template.branches.find(({ guard }) => matchesGuard(guard, value));
  return branch ? branch.text : template.fallback;
}
