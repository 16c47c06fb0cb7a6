/**
 * Error Module Exports
 *
 * Centralized export of all error types.
 */

export * from './TranslationError';
