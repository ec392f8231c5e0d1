import path from 'path';
import { UnsupportedFileTypeError } from '../errors/appErrors';

const SUPPORTED_EXTENSIONS = {
  pdf: 'PDF Document',
  doc: 'Word Document',
  docx: 'Word Document',
  xls: 'Excel Spreadsheet',
  xlsx: 'Excel Spreadsheet',
  txt: 'Text File',
  md: 'Markdown File',
} as const;

export type SupportedExtension = keyof typeof SUPPORTED_EXTENSIONS;

const EXTENSIONS = Object.keys(SUPPORTED_EXTENSIONS);

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_EXTENSIONS, ext);
}

/**
 * Checks a file name against the extension allow-list.
 * Returns the canonical (lowercase, dotless) extension, or throws
 * UnsupportedFileTypeError, including when the name has no extension at all.
 */
export function validateFileName(fileName: string): SupportedExtension {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  if (!isSupportedExtension(ext)) {
    throw new UnsupportedFileTypeError(ext, EXTENSIONS);
  }
  return ext;
}

export function supportedExtensions(): Record<SupportedExtension, string> {
  return { ...SUPPORTED_EXTENSIONS };
}
