/**
 * Translation file loading
 *
 * @module loader
 */

export {
  loadCatalogueBag,
  loadCatalogueBagSync,
  listTranslationFiles,
  listTranslationFilesSync,
  parseFileName,
  parseMessages,
  DEFAULT_EXTENSIONS,
} from './fileLoader';

export type { LoaderOptions, TranslationFile, TranslationFileIndex } from './fileLoader';
