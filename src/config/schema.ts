/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of the i18n configuration.
 */

import { z } from 'zod';
import { Locale } from '../i18n/locale';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LocaleTagSchema = z
  .string()
  .min(1, 'locale tag is required')
  .refine((tag) => Locale.isValidTag(tag), (tag) => ({ message: `'${tag}' is not a known locale` }))
  .transform((tag) => Locale.fromTag(tag).toTag());

export const FileExtensionSchema = z
  .string()
  .regex(/^[a-z0-9]+$/, 'extension must be alphanumeric');

export const I18nConfigSchema = z.object({
  defaultLocale: LocaleTagSchema,
  fallbackLocale: LocaleTagSchema.nullable(),
  translationsDir: z.string().min(1, 'translations directory is required'),
  fileExtensions: z.array(FileExtensionSchema).min(1, 'at least one file extension is required'),
  templateCacheSize: z.number().int().min(1).max(1_000_000),
  logLevel: LogLevelSchema,
});

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
}

/**
 * Validate a configuration object, collecting every issue
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = I18nConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, errors: [] };
  }

  return { success: false, errors: formatIssues(result.error.issues) };
}

/**
 * Format Zod issues into readable `path: message` lines
 */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });
}
