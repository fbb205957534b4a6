/**
 * Parser module exports.
 */

export {
  parseFile,
  readDocumentFile,
  decodeText,
  getFileExtension,
  isSupportedFileType,
  SUPPORTED_EXTENSIONS,
  type ParseResult,
  type SupportedExtension,
} from './file-parser';
