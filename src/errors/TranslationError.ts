/**
 * Translation Error Class Hierarchy
 *
 * Every failure the engine, the loader or the configuration layer can report.
 * Each error type carries a machine-readable code and structured details.
 *
 * ## Usage
 *
 * ```typescript
 * try {
 *   translator.translate(locale, 'messages', 'greeting', { name: 'Ada' });
 * } catch (error) {
 *   if (error instanceof MessageNotFoundError) {
 *     log.warn('Missing message', error.details);
 *   }
 * }
 * ```
 */

import type { Locale } from '../i18n/locale';

/**
 * Serialized error structure
 */
export interface TranslationErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Locale parsing
  INVALID_LOCALE: 'INVALID_LOCALE',

  // Template interpretation
  INVALID_TEMPLATE: 'INVALID_TEMPLATE',
  MISSING_PLURAL_CONTEXT: 'MISSING_PLURAL_CONTEXT',

  // Lookup
  MESSAGE_NOT_FOUND: 'MESSAGE_NOT_FOUND',

  // Catalogue loading
  DIRECTORY_UNREADABLE: 'DIRECTORY_UNREADABLE',
  FILE_UNREADABLE: 'FILE_UNREADABLE',
  INVALID_FILENAME: 'INVALID_FILENAME',
  INVALID_FILE_CONTENT: 'INVALID_FILE_CONTENT',

  // Configuration
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type LoadErrorCode =
  | typeof ErrorCodes.DIRECTORY_UNREADABLE
  | typeof ErrorCodes.FILE_UNREADABLE
  | typeof ErrorCodes.INVALID_FILENAME
  | typeof ErrorCodes.INVALID_FILE_CONTENT;

/**
 * Base translation error class
 *
 * All errors raised by this package extend this class.
 */
export class TranslationError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();

    // Maintain proper stack trace for V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a plain serializable object
   */
  toJSON(): TranslationErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }

  static isTranslationError(error: unknown): error is TranslationError {
    return error instanceof TranslationError;
  }
}

// =============================================================================
// Engine Errors
// =============================================================================

export class LocaleParseError extends TranslationError {
  readonly tag: string;

  constructor(tag: string) {
    super(`Invalid locale: expected a valid locale code but found '${tag}'`, ErrorCodes.INVALID_LOCALE, {
      tag,
    });
    this.tag = tag;
  }
}

export class TemplateError extends TranslationError {
  readonly template: string;

  constructor(reason: string, template: string) {
    super(`Malformed template: ${reason}`, ErrorCodes.INVALID_TEMPLATE, { template });
    this.template = template;
  }
}

export class MissingPluralContextError extends TranslationError {
  readonly domain: string;
  readonly id: string;
  readonly locale: string;

  constructor(locale: Locale, domain: string, id: string) {
    super(
      `Message '${id}' in '${domain}' domain for '${locale.toTag()}' locale is pluralized but no count was provided`,
      ErrorCodes.MISSING_PLURAL_CONTEXT,
      { locale: locale.toTag(), domain, id }
    );
    this.domain = domain;
    this.id = id;
    this.locale = locale.toTag();
  }
}

export class MessageNotFoundError extends TranslationError {
  readonly domain: string;
  readonly id: string;
  readonly attemptedLocales: readonly string[];

  constructor(domain: string, id: string, attemptedLocales: readonly Locale[]) {
    const tags = attemptedLocales.map((locale) => locale.toTag());
    super(
      `Message '${id}' could not be found in '${domain}' domain for any of [${tags.join(', ')}]`,
      ErrorCodes.MESSAGE_NOT_FOUND,
      { domain, id, attemptedLocales: tags }
    );
    this.domain = domain;
    this.id = id;
    this.attemptedLocales = tags;
  }
}

// =============================================================================
// Loader and Configuration Errors
// =============================================================================

export class CatalogueLoadError extends TranslationError {
  readonly path: string;

  constructor(code: LoadErrorCode, message: string, path: string, details?: Record<string, unknown>) {
    super(message, code, { path, ...details });
    this.path = path;
  }
}

export class ConfigurationError extends TranslationError {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`, ErrorCodes.INVALID_CONFIGURATION, {
      issues,
    });
    this.issues = issues;
  }
}
